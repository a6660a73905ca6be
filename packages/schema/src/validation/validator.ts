/**
 * @title Validator Module
 * @description JSON Schema compilation and document validation with ajv.
 *
 * @module validation
 */

import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from "ajv";
import { createLogger, getErrorMessage } from "@lazyschema/core";
import type { JsonObject, JsonValue, ValidationErrorRecord } from "../types/document.js";
import { SchemaCompileError } from "../errors.js";

const log = createLogger("validator");

/**
 * A schema compiled into a reusable validation function.
 */
export interface CompiledSchema {
	/**
	 * Check a document against the schema.
	 *
	 * @returns Error records in the order ajv reports them; empty when valid
	 */
	validate(document: JsonValue): ValidationErrorRecord[];
}

function isJsonObject(value: JsonValue): value is JsonObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toSchemaObject(schema: JsonObject): SchemaObject {
	const result: SchemaObject = {};
	for (const [key, value] of Object.entries(schema)) {
		result[key] = value;
	}
	return result;
}

function escapePointerToken(token: string): string {
	return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Convert an ajv error into a validation error record.
 *
 * Missing required properties point at the property that is missing
 * rather than at the object that lacks it.
 */
export function toErrorRecord(error: ErrorObject): ValidationErrorRecord {
	let path = error.instancePath;
	const missing: unknown = error.params["missingProperty"];
	if (error.keyword === "required" && typeof missing === "string") {
		path = `${path}/${escapePointerToken(missing)}`;
	}

	return {
		path,
		message: error.message ?? `must pass "${error.keyword}" keyword validation`,
		keyword: error.keyword,
		schemaPath: error.schemaPath,
	};
}

/**
 * Compile a schema document.
 *
 * A fresh ajv instance is used for every compilation, so a schema carrying
 * an `$id` can be compiled any number of times.
 *
 * @param schema - Schema document (an object or a boolean schema)
 * @returns Compiled schema
 * @throws SchemaCompileError if ajv rejects the schema
 */
export function compileSchema(schema: JsonValue): CompiledSchema {
	let target: boolean | SchemaObject;
	if (typeof schema === "boolean") {
		target = schema;
	} else if (isJsonObject(schema)) {
		target = toSchemaObject(schema);
	} else {
		const kind = schema === null ? "null" : Array.isArray(schema) ? "array" : typeof schema;
		throw new SchemaCompileError(`Schema must be an object or a boolean, got ${kind}`);
	}

	const ajv = new Ajv({
		allErrors: true,
		strict: false,
		logger: { log, warn: log, error: log },
	});

	let validateFn: ValidateFunction;
	try {
		validateFn = ajv.compile(target);
	} catch (error) {
		throw new SchemaCompileError(`Failed to compile schema: ${getErrorMessage(error)}`, { cause: error });
	}
	log("compiled schema");

	return {
		validate(document: JsonValue): ValidationErrorRecord[] {
			if (validateFn(document)) {
				return [];
			}
			return (validateFn.errors ?? []).map(toErrorRecord);
		},
	};
}
