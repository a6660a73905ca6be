/**
 * Public type exports for @lazyschema/schema.
 */

export type {
	JsonValue,
	JsonObject,
	DocumentFormat,
	DocumentSource,
	ValidationErrorRecord,
} from "./document.js";
