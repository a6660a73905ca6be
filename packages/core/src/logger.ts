/**
 * @title Logging Module
 * @description Namespaced debug logging.
 *
 * Output is silent unless enabled through the DEBUG environment variable,
 * e.g. `DEBUG=lazyschema:*`.
 *
 * @module logger
 */

import createDebug from "debug";

/** Root namespace shared by every lazyschema logger. */
export const LOG_NAMESPACE = "lazyschema";

/**
 * A logger function with printf-style formatting.
 */
export type Logger = createDebug.Debugger;

/**
 * Create a logger for a scope such as "store" or "http".
 *
 * @param scope - Sub-namespace appended to the root namespace
 * @returns Logger writing under `lazyschema:<scope>`
 */
export function createLogger(scope: string): Logger {
	return createDebug(`${LOG_NAMESPACE}:${scope}`);
}
