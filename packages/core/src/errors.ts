/**
 * @title Errors
 * @description Error types for @lazyschema/core.
 *
 * Every failure raised by the lazyschema packages derives from
 * LazySchemaError so callers can branch on `code` instead of messages.
 *
 * @module errors
 */

/**
 * Options for constructing a LazySchemaError.
 */
export interface LazySchemaErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all lazyschema errors.
 */
export class LazySchemaError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: LazySchemaErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "LazySchemaError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error related to network operations.
 */
export class NetworkError extends LazySchemaError {
	/** HTTP status code if available. */
	readonly statusCode?: number;

	constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
		super(message, "NETWORK_ERROR", {
			suggestion: "Check your internet connection and proxy settings",
			cause: options?.cause,
		});
		this.name = "NetworkError";
		this.statusCode = options?.statusCode;
	}
}

/**
 * Check if an error is a LazySchemaError.
 */
export function isLazySchemaError(error: unknown): error is LazySchemaError {
	return error instanceof LazySchemaError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a LazySchemaError.
 * Errors that already are LazySchemaErrors pass through untouched.
 */
export function wrapError(error: unknown, context?: string): LazySchemaError {
	if (isLazySchemaError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new LazySchemaError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
