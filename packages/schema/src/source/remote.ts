/**
 * @title Remote Source Module
 * @description Where the canonical schema text is downloaded from.
 *
 * @module source
 */

import { fetchText, type HttpOptions } from "@lazyschema/core";

/**
 * A remote endpoint serving the canonical schema as text.
 */
export interface RemoteSource {
	/** URL the schema is served from, for logs and error messages. */
	readonly url: string;
	/**
	 * Download the schema text.
	 * Rejects with NetworkError on transport failure or a non-2xx status.
	 */
	fetchText(): Promise<string>;
}

/**
 * Remote source performing a single HTTP GET per download.
 */
export class HttpRemoteSource implements RemoteSource {
	constructor(
		readonly url: string,
		private readonly options: HttpOptions = {},
	) {}

	fetchText(): Promise<string> {
		return fetchText(this.url, { ...this.options, headers: { Accept: "application/json", ...this.options.headers } });
	}
}
