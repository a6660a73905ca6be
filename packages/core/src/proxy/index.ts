/**
 * Proxy configuration and fetch utilities.
 */

export { getProxyConfig, getProxyForUrl, shouldBypassProxy, type ProxyConfig } from "./config.js";
export { proxyFetch, clearProxyAgents, type ProxyFetchOptions } from "./fetch.js";
