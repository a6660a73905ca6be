/**
 * HTTP module exports.
 */

export { type HttpOptions, DEFAULT_TIMEOUT, fetchText } from "./request.js";
