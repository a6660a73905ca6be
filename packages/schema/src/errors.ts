/**
 * @title Errors
 * @description Error types for @lazyschema/schema.
 *
 * Each stage of the load/fetch/validate lifecycle has its own error class
 * so callers can tell which one failed.
 *
 * @module errors
 */

import { LazySchemaError } from "@lazyschema/core";

/**
 * Base class for schema store errors.
 */
export class SchemaError extends LazySchemaError {
	/** Path of the file involved, when there is one. */
	readonly filePath?: string;

	constructor(message: string, code: string, options?: { filePath?: string; suggestion?: string; cause?: unknown }) {
		super(message, code, {
			suggestion: options?.suggestion ?? (options?.filePath ? `Check the file at: ${options.filePath}` : undefined),
			cause: options?.cause,
		});
		this.name = "SchemaError";
		this.filePath = options?.filePath;
	}
}

/**
 * The cached schema file (or a document to validate) could not be opened.
 */
export class SchemaNotFoundError extends SchemaError {
	constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, "NOT_FOUND", options);
		this.name = "SchemaNotFoundError";
	}
}

/**
 * Content is not a well-formed structured document.
 */
export class SchemaParseError extends SchemaError {
	constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, "PARSE_ERROR", options);
		this.name = "SchemaParseError";
	}
}

/**
 * A fetch was attempted while the cache file already exists.
 */
export class SchemaAlreadyExistsError extends SchemaError {
	constructor(filePath: string, options?: { cause?: unknown }) {
		super(`Tried to download the schema but ${filePath} already exists`, "ALREADY_EXISTS", {
			filePath,
			suggestion: `Remove ${filePath} to download a fresh copy`,
			cause: options?.cause,
		});
		this.name = "SchemaAlreadyExistsError";
	}
}

/**
 * The downloaded schema could not be persisted.
 */
export class SchemaWriteError extends SchemaError {
	constructor(message: string, options?: { filePath?: string; cause?: unknown }) {
		super(message, "WRITE_ERROR", options);
		this.name = "SchemaWriteError";
	}
}

/**
 * The schema document was loaded but is not a schema the validator accepts.
 */
export class SchemaCompileError extends SchemaError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "COMPILE_ERROR", {
			suggestion: "Remove the cached schema file so a fresh copy is downloaded",
			cause: options?.cause,
		});
		this.name = "SchemaCompileError";
	}
}

/**
 * Both the cache and the download fallback failed to produce a schema.
 */
export class SchemaUnavailableError extends SchemaError {
	/** Failure of the load that was attempted last. */
	readonly loadError: unknown;
	/** Failure of the download fallback, when the download itself failed. */
	readonly fetchError?: unknown;
	/** Failure of the first load, when a second load was attempted after a download. */
	readonly initialLoadError?: unknown;

	constructor(message: string, causes: { loadError: unknown; fetchError?: unknown; initialLoadError?: unknown }) {
		super(message, "SCHEMA_UNAVAILABLE", { cause: causes.fetchError ?? causes.loadError });
		this.name = "SchemaUnavailableError";
		this.loadError = causes.loadError;
		this.fetchError = causes.fetchError;
		this.initialLoadError = causes.initialLoadError;
	}
}
