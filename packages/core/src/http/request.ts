/**
 * @title HTTP Utilities Module
 * @description Single-attempt HTTP GET with timeout support.
 *
 * Failures surface immediately as NetworkError; nothing is retried.
 *
 * @module http
 */

import { NetworkError, getErrorMessage } from "../errors.js";
import { createLogger } from "../logger.js";
import { proxyFetch } from "../proxy/index.js";

const log = createLogger("http");

/**
 * Options for HTTP requests.
 */
export interface HttpOptions {
	/** Request timeout in milliseconds (default: 30000). */
	timeout?: number;
	/** Custom headers to include. */
	headers?: Record<string, string>;
}

export const DEFAULT_TIMEOUT = 30000;

const USER_AGENT = "lazyschema";

/**
 * Fetch text with timeout support.
 * The timeout covers both the request and reading the body.
 *
 * @param url - URL to fetch
 * @param options - HTTP options
 * @returns Response text
 */
export async function fetchText(url: string, options: HttpOptions = {}): Promise<string> {
	const { timeout = DEFAULT_TIMEOUT, headers = {} } = options;
	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeout);

	log("GET %s", url);

	try {
		let response: Response;
		try {
			response = await proxyFetch(url, {
				method: "GET",
				headers: { "User-Agent": USER_AGENT, ...headers },
				signal: controller.signal,
			});
		} catch (error) {
			if (controller.signal.aborted) {
				throw new NetworkError(`Request to ${url} timed out after ${timeout}ms`, { cause: error });
			}
			throw new NetworkError(`Request to ${url} failed: ${getErrorMessage(error)}`, { cause: error });
		}

		if (!response.ok) {
			throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, { statusCode: response.status });
		}

		try {
			return await response.text();
		} catch (error) {
			throw new NetworkError(`Could not read response body from ${url}: ${getErrorMessage(error)}`, {
				statusCode: response.status,
				cause: error,
			});
		}
	} finally {
		clearTimeout(timeoutId);
	}
}
