/**
 * @lazyschema/core - Shared plumbing for the lazyschema packages.
 *
 * This library provides:
 * - Typed errors with codes and suggestions
 * - Single-attempt HTTP text fetching with timeouts
 * - Proxy-aware fetch driven by HTTP_PROXY / HTTPS_PROXY / NO_PROXY
 * - Cache locations resolving logical keys to files
 * - Namespaced debug logging
 */

// Error exports
export {
	LazySchemaError,
	type LazySchemaErrorOptions,
	NetworkError,
	isLazySchemaError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Logging exports
export { type Logger, LOG_NAMESPACE, createLogger } from "./logger.js";

// HTTP exports
export * from "./http/index.js";

// Proxy exports
export * from "./proxy/index.js";

// Cache exports
export * from "./cache/index.js";
