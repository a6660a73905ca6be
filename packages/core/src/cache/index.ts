/**
 * Cache location exports.
 */

export { type CacheLocation, FileCacheLocation, getDefaultCacheDir } from "./location.js";
