/**
 * @title Proxy-Aware Fetch Module
 * @description Fetch wrapper that routes through undici's ProxyAgent when a proxy applies.
 *
 * @module proxy
 */

import { fetch as undiciFetch, ProxyAgent, type Dispatcher } from "undici";
import { getProxyForUrl, type ProxyConfig } from "./config.js";

/**
 * Options for proxy-aware fetch.
 */
export interface ProxyFetchOptions extends RequestInit {
	/** Proxy configuration. If not provided, reads from environment. */
	proxyConfig?: ProxyConfig;
}

/** One agent per proxy URL, kept for the life of the process. */
const agents = new Map<string, ProxyAgent>();

function agentFor(proxyUrl: string): ProxyAgent {
	let agent = agents.get(proxyUrl);
	if (!agent) {
		agent = new ProxyAgent(proxyUrl);
		agents.set(proxyUrl, agent);
	}
	return agent;
}

/**
 * Proxy-aware fetch function.
 *
 * Falls back to the global fetch when no proxy matches the URL.
 *
 * @param url - URL to fetch
 * @param options - Fetch options with optional proxy configuration
 */
export async function proxyFetch(url: string | URL, options: ProxyFetchOptions = {}): Promise<Response> {
	const { proxyConfig, ...init } = options;
	const target = url.toString();
	const proxyUrl = getProxyForUrl(target, proxyConfig);

	if (!proxyUrl) {
		return fetch(target, init);
	}

	// undici's own Dispatcher and Response types differ nominally from the
	// globals even though they are the same implementation at runtime.
	return undiciFetch(target, {
		...init,
		dispatcher: agentFor(proxyUrl) as unknown as Dispatcher,
	}) as unknown as Response;
}

/**
 * Close and forget every cached proxy agent.
 */
export async function clearProxyAgents(): Promise<void> {
	const closing = [...agents.values()].map((agent) => agent.close());
	agents.clear();
	await Promise.all(closing);
}
