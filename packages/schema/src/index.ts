/**
 * @lazyschema/schema - A single lazily fetched, disk-cached JSON Schema
 * used to validate structured documents.
 *
 * This library provides functionality for:
 * - Loading the schema from a cache location
 * - Downloading it from a remote source when the cache is cold
 * - Validating JSON and YAML documents against it with ajv
 */

// Error exports
export {
	SchemaError,
	SchemaNotFoundError,
	SchemaParseError,
	SchemaAlreadyExistsError,
	SchemaWriteError,
	SchemaCompileError,
	SchemaUnavailableError,
} from "./errors.js";

// Type exports
export * from "./types/index.js";

// Parsing exports
export * from "./parsing/index.js";

// Validation exports
export * from "./validation/index.js";

// Remote source exports
export * from "./source/index.js";

// Store exports
export * from "./store/index.js";
