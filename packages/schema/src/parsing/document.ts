/**
 * @title Document Parsing Module
 * @description Parsing of JSON and YAML documents into plain JSON values.
 *
 * @module parsing
 */

import * as yaml from "js-yaml";
import { getErrorMessage } from "@lazyschema/core";
import type { DocumentFormat, DocumentSource, JsonValue } from "../types/document.js";
import { SchemaParseError } from "../errors.js";

/**
 * Options for parsing a document.
 */
export interface ParseOptions {
	/** Content format (default: "json"). */
	format?: DocumentFormat;
	/** Where the content came from, for error messages. */
	sourcePath?: string;
}

/**
 * Detect the document format from a file path based on its extension.
 */
export function detectFormat(filePath: string): DocumentFormat {
	return /\.ya?ml$/i.test(filePath) ? "yaml" : "json";
}

function isJsonTree(value: unknown, ancestors: Set<object>): boolean {
	if (value === null || typeof value === "string" || typeof value === "boolean") {
		return true;
	}
	if (typeof value === "number") {
		return Number.isFinite(value);
	}
	if (typeof value !== "object" || ancestors.has(value)) {
		return false;
	}

	let children: unknown[];
	if (Array.isArray(value)) {
		children = value;
	} else if (Object.getPrototypeOf(value) === Object.prototype) {
		children = Object.values(value);
	} else {
		return false;
	}

	ancestors.add(value);
	const ok = children.every((child) => isJsonTree(child, ancestors));
	ancestors.delete(value);
	return ok;
}

/**
 * Type guard for values that survive a JSON round trip unchanged.
 * Cyclic graphs, such as YAML anchors that contain their own alias, are rejected;
 * the same object reached twice along different branches is accepted.
 */
export function isJsonValue(value: unknown): value is JsonValue {
	return isJsonTree(value, new Set());
}

/**
 * Parse document content from a JSON or YAML string.
 *
 * YAML is read with the JSON schema of js-yaml, so timestamps and other
 * YAML-only types stay strings.
 *
 * @param content - Document text
 * @param options - Format and source path
 * @returns Parsed value
 * @throws SchemaParseError if the content is not a well-formed document
 */
export function parseDocument(content: string, options: ParseOptions = {}): JsonValue {
	const { format = "json", sourcePath } = options;
	const label = sourcePath ?? "document";
	const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

	let raw: unknown;
	try {
		raw = format === "json" ? JSON.parse(text) : (yaml.load(text, { schema: yaml.JSON_SCHEMA }) ?? null);
	} catch (error) {
		throw new SchemaParseError(`Failed to parse ${label} as ${format.toUpperCase()}: ${getErrorMessage(error)}`, {
			filePath: sourcePath,
			cause: error,
		});
	}

	if (!isJsonValue(raw)) {
		throw new SchemaParseError(`${label} contains values that cannot be represented as JSON`, { filePath: sourcePath });
	}

	return raw;
}

/**
 * Decode bytes as strict UTF-8.
 *
 * @param bytes - Raw content
 * @param sourcePath - Where the bytes came from, for error messages
 * @returns Decoded text
 * @throws SchemaParseError if the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array, sourcePath?: string): string {
	try {
		return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
	} catch (error) {
		throw new SchemaParseError(`${sourcePath ?? "document"} is not valid UTF-8: ${getErrorMessage(error)}`, {
			filePath: sourcePath,
			cause: error,
		});
	}
}

/**
 * Collect a byte source into its raw bytes.
 * String chunks are encoded as UTF-8.
 *
 * @param source - Whole buffer or stream of chunks
 * @returns Concatenated content
 */
export async function readSource(source: DocumentSource): Promise<Uint8Array> {
	if (source instanceof Uint8Array) {
		return source;
	}

	const chunks: Buffer[] = [];
	for await (const chunk of source) {
		chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk));
	}
	return Buffer.concat(chunks);
}
