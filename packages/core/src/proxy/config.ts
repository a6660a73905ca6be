/**
 * @title Proxy Configuration Module
 * @description Proxy settings read from the standard environment variables.
 *
 * @module proxy
 *
 * @envvar HTTP_PROXY / http_proxy - Proxy URL for plain HTTP requests.
 * @envvar HTTPS_PROXY / https_proxy - Proxy URL for HTTPS requests.
 * @envvar NO_PROXY / no_proxy - Comma or space-separated hosts that bypass the proxy.
 *
 * Uppercase variants win when both spellings are set.
 *
 * @example
 * ```bash
 * export HTTPS_PROXY=http://proxy.example.com:8080
 * export NO_PROXY=localhost,.internal.example
 * ```
 */

/**
 * Proxy configuration.
 */
export interface ProxyConfig {
	/** Proxy URL for HTTP requests. */
	httpProxy?: string;
	/** Proxy URL for HTTPS requests. */
	httpsProxy?: string;
	/** Lowercased host patterns that bypass the proxy. */
	noProxy: string[];
}

function readEnv(name: string): string | undefined {
	return process.env[name.toUpperCase()] ?? process.env[name.toLowerCase()];
}

function splitNoProxy(value: string | undefined): string[] {
	if (!value) {
		return [];
	}
	return value
		.split(/[,\s]+/)
		.map((entry) => entry.trim().toLowerCase())
		.filter((entry) => entry.length > 0);
}

/**
 * Read proxy configuration from environment variables.
 */
export function getProxyConfig(): ProxyConfig {
	return {
		httpProxy: readEnv("HTTP_PROXY"),
		httpsProxy: readEnv("HTTPS_PROXY"),
		noProxy: splitNoProxy(readEnv("NO_PROXY")),
	};
}

/**
 * Check if a hostname should bypass the proxy.
 *
 * `*` matches every host, `.example.com` matches the domain and its
 * subdomains, and a bare `example.com` matches itself and its subdomains.
 * CIDR ranges are compared literally.
 *
 * @param hostname - Hostname to check
 * @param noProxy - NO_PROXY patterns
 */
export function shouldBypassProxy(hostname: string, noProxy: string[]): boolean {
	const host = hostname.toLowerCase();

	return noProxy.some((pattern) => {
		if (pattern === "*") {
			return true;
		}
		const domain = pattern.startsWith(".") ? pattern.slice(1) : pattern;
		return host === domain || host.endsWith(`.${domain}`);
	});
}

/**
 * Get the proxy URL to use for a request URL.
 *
 * @param url - Request URL
 * @param config - Proxy configuration (read from the environment when omitted)
 * @returns Proxy URL or undefined when the request goes direct
 */
export function getProxyForUrl(url: string, config: ProxyConfig = getProxyConfig()): string | undefined {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return undefined;
	}

	if (shouldBypassProxy(parsed.hostname, config.noProxy)) {
		return undefined;
	}

	switch (parsed.protocol) {
		case "https:":
			return config.httpsProxy ?? config.httpProxy;
		case "http:":
			return config.httpProxy;
		default:
			return undefined;
	}
}
