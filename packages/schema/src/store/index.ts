/**
 * Schema store exports.
 */

export {
	DEFAULT_CACHE_KEY,
	type SchemaStoreOptions,
	type ValidateSourceOptions,
	SchemaStore,
} from "./schema-store.js";
