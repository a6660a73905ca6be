/**
 * Document parsing exports.
 */

export { type ParseOptions, decodeUtf8, detectFormat, isJsonValue, parseDocument, readSource } from "./document.js";
