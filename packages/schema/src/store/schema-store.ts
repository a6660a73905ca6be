/**
 * @title Schema Store Module
 * @description Lazily loaded, disk-cached schema with validation on top.
 *
 * The store reads the schema from its cache location and only downloads it
 * when the cached copy cannot be loaded, so a pre-provisioned cache never
 * touches the network. A download never replaces an existing cache file:
 * remove the entry through the cache location to force a fresh copy.
 *
 * @module store
 */

import * as fs from "node:fs";
import type { FileHandle } from "node:fs/promises";
import {
	type CacheLocation,
	FileCacheLocation,
	LazySchemaError,
	NetworkError,
	createLogger,
	getErrorMessage,
	wrapError,
} from "@lazyschema/core";
import type { DocumentFormat, DocumentSource, JsonValue, ValidationErrorRecord } from "../types/document.js";
import { decodeUtf8, detectFormat, parseDocument, readSource } from "../parsing/document.js";
import { compileSchema } from "../validation/validator.js";
import { HttpRemoteSource, type RemoteSource } from "../source/remote.js";
import {
	SchemaAlreadyExistsError,
	SchemaNotFoundError,
	SchemaUnavailableError,
	SchemaWriteError,
} from "../errors.js";

const log = createLogger("store");

/** Default cache key of the schema document. */
export const DEFAULT_CACHE_KEY = "schema.json";

/**
 * Options for constructing a SchemaStore.
 */
export interface SchemaStoreOptions {
	/** Where the schema is cached (default: FileCacheLocation in the platform cache directory). */
	location?: CacheLocation;
	/** Where the schema is downloaded from. Takes precedence over `schemaUrl`. */
	source?: RemoteSource;
	/** URL of the canonical schema, used when no `source` is given. */
	schemaUrl?: string;
	/** Cache key of the schema document (default: "schema.json"). */
	cacheKey?: string;
	/** Download timeout in milliseconds, used with `schemaUrl`. */
	timeout?: number;
}

/**
 * Options for validating a document read from a byte source.
 */
export interface ValidateSourceOptions {
	/** Format of the source content (default: "json"). */
	format?: DocumentFormat;
	/** Where the content came from, for error messages. */
	sourcePath?: string;
}

function deepFreeze(value: JsonValue): JsonValue {
	if (value !== null && typeof value === "object") {
		for (const child of Object.values(value)) {
			deepFreeze(child);
		}
		Object.freeze(value);
	}
	return value;
}

function isAlreadyExists(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "EEXIST";
}

/**
 * Holds one schema document, loading it from disk or downloading it on
 * first use.
 *
 * Once loaded, the document is frozen and kept for the lifetime of the
 * instance. Operations on one instance are expected to run one at a time.
 *
 * @example
 * ```typescript
 * const store = new SchemaStore({ schemaUrl: "https://example.com/schema.json" });
 * const errors = await store.validateFile("config.json");
 * for (const { path, message } of errors) {
 *   console.log(`${path || "/"}: ${message}`);
 * }
 * ```
 */
export class SchemaStore {
	readonly location: CacheLocation;
	readonly source: RemoteSource;
	readonly cacheKey: string;
	/** Path of the cached schema file. */
	readonly schemaPath: string;

	private cached: JsonValue | undefined;

	constructor(options: SchemaStoreOptions = {}) {
		const { location = new FileCacheLocation(), source, schemaUrl, cacheKey = DEFAULT_CACHE_KEY, timeout } = options;

		if (source) {
			this.source = source;
		} else if (schemaUrl) {
			this.source = new HttpRemoteSource(schemaUrl, { timeout });
		} else {
			throw new LazySchemaError("SchemaStore needs either a source or a schemaUrl", "CONFIG_ERROR", {
				suggestion: "Pass the URL of the canonical schema as the schemaUrl option",
			});
		}

		try {
			this.schemaPath = location.resolve(cacheKey);
		} catch (error) {
			throw new LazySchemaError(`Invalid cache key "${cacheKey}": ${getErrorMessage(error)}`, "CONFIG_ERROR", {
				suggestion: "Use a file name inside the cache directory as the cacheKey option",
				cause: error,
			});
		}

		this.location = location;
		this.cacheKey = cacheKey;
	}

	/**
	 * Return the schema, reading it from the cache location on first call.
	 *
	 * @throws SchemaNotFoundError if the cache file cannot be opened
	 * @throws SchemaParseError if the cache file is not valid UTF-8 JSON
	 */
	async load(): Promise<JsonValue> {
		if (this.cached !== undefined) {
			return this.cached;
		}

		const filePath = this.schemaPath;
		let bytes: Uint8Array;
		try {
			bytes = await this.location.read(this.cacheKey);
		} catch (error) {
			throw new SchemaNotFoundError(`Could not open ${filePath}: ${getErrorMessage(error)}`, {
				filePath,
				cause: error,
			});
		}

		const content = decodeUtf8(bytes, filePath);
		const schema = deepFreeze(parseDocument(content, { format: "json", sourcePath: filePath }));
		this.cached = schema;
		log("loaded schema from %s", filePath);
		return schema;
	}

	/**
	 * Download the schema and write it verbatim to the cache location.
	 * Leaves the in-memory state untouched; call load() afterwards.
	 *
	 * @throws SchemaAlreadyExistsError if the cache file already exists
	 * @throws NetworkError if the download fails
	 * @throws SchemaWriteError if the file cannot be written
	 */
	async fetch(): Promise<void> {
		const filePath = this.schemaPath;

		let exists: boolean;
		try {
			exists = await this.location.exists(this.cacheKey);
		} catch (error) {
			throw wrapError(error, `Could not check ${filePath}`);
		}
		if (exists) {
			throw new SchemaAlreadyExistsError(filePath);
		}

		log("downloading schema from %s", this.source.url);
		let text: string;
		try {
			text = await this.source.fetchText();
		} catch (error) {
			throw new NetworkError(`Could not download the schema from ${this.source.url}: ${getErrorMessage(error)}`, {
				statusCode: error instanceof NetworkError ? error.statusCode : undefined,
				cause: error,
			});
		}

		try {
			await this.location.createExclusive(this.cacheKey, text);
		} catch (error) {
			if (isAlreadyExists(error)) {
				throw new SchemaAlreadyExistsError(filePath, { cause: error });
			}
			throw new SchemaWriteError(`Could not write ${filePath}: ${getErrorMessage(error)}`, {
				filePath,
				cause: error,
			});
		}
		log("downloaded schema to %s", filePath);
	}

	/**
	 * The schema if it has been loaded, without any I/O.
	 */
	get(): JsonValue | undefined {
		return this.cached;
	}

	/**
	 * Load the schema, downloading it first if loading fails.
	 * The download and the second load are each attempted once.
	 *
	 * @throws SchemaUnavailableError carrying the load and download failures
	 */
	async ensure(): Promise<JsonValue> {
		let initialLoadError: unknown;
		try {
			return await this.load();
		} catch (error) {
			initialLoadError = error;
			log("could not load cached schema: %s", getErrorMessage(error));
		}

		try {
			await this.fetch();
		} catch (fetchError) {
			throw new SchemaUnavailableError(
				`Schema is unavailable. Load failed: ${getErrorMessage(initialLoadError)}. Download failed: ${getErrorMessage(fetchError)}`,
				{ loadError: initialLoadError, fetchError },
			);
		}

		try {
			return await this.load();
		} catch (loadError) {
			throw new SchemaUnavailableError(
				`Downloaded the schema but could not load it: ${getErrorMessage(loadError)}`,
				{ loadError, initialLoadError },
			);
		}
	}

	/**
	 * Validate a document against the schema.
	 * The schema is compiled afresh on every call.
	 *
	 * @returns Error records; empty when the document conforms
	 * @throws SchemaUnavailableError if the schema cannot be obtained
	 * @throws SchemaCompileError if the schema document is not a valid schema
	 */
	async validate(document: JsonValue): Promise<ValidationErrorRecord[]> {
		const schema = await this.ensure();
		const errors = compileSchema(schema).validate(document);
		log("validated document: %d error(s)", errors.length);
		return errors;
	}

	/**
	 * Read and parse a document from a byte source, then validate it.
	 *
	 * @throws SchemaParseError if the source is not well-formed UTF-8 JSON or YAML
	 */
	async validateSource(source: DocumentSource, options: ValidateSourceOptions = {}): Promise<ValidationErrorRecord[]> {
		const { format = "json", sourcePath } = options;

		let bytes: Uint8Array;
		try {
			bytes = await readSource(source);
		} catch (error) {
			throw wrapError(error, `Could not read ${sourcePath ?? "document"}`);
		}

		return this.validate(parseDocument(decodeUtf8(bytes, sourcePath), { format, sourcePath }));
	}

	/**
	 * Validate a JSON or YAML file, choosing the format from its extension.
	 *
	 * @throws SchemaNotFoundError if the file cannot be opened
	 */
	async validateFile(filePath: string): Promise<ValidationErrorRecord[]> {
		let handle: FileHandle;
		try {
			handle = await fs.promises.open(filePath, "r");
		} catch (error) {
			throw new SchemaNotFoundError(`Could not open ${filePath} to validate: ${getErrorMessage(error)}`, {
				filePath,
				cause: error,
			});
		}

		try {
			return await this.validateSource(handle.createReadStream({ autoClose: false }), {
				format: detectFormat(filePath),
				sourcePath: filePath,
			});
		} finally {
			await handle.close();
		}
	}
}
