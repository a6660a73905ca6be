/**
 * @title Document Types
 * @description Shapes of schema documents, validated documents and validation results.
 *
 * @module types
 */

/**
 * Any value representable as JSON.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A JSON object.
 */
export interface JsonObject {
	[key: string]: JsonValue;
}

/**
 * Text formats a structured document can be parsed from.
 */
export type DocumentFormat = "json" | "yaml";

/**
 * Raw bytes of a document, either whole or as a stream of chunks.
 * Node.js readable streams and file handles' streams satisfy AsyncIterable.
 */
export type DocumentSource = Uint8Array | AsyncIterable<Uint8Array | string>;

/**
 * A single reason a document does not conform to the schema.
 *
 * Treat records as diagnostics: only `path` and `message` are meant for
 * display, the rest is informative.
 */
export interface ValidationErrorRecord {
	/** JSON Pointer to the offending location in the validated document ("" is the root). */
	path: string;
	/** Human-readable reason. */
	message: string;
	/** Schema keyword that failed (e.g. "required", "type"). */
	keyword: string;
	/** JSON Pointer to the failing keyword inside the schema. */
	schemaPath: string;
}
