/**
 * Validation exports.
 */

export { type CompiledSchema, compileSchema, toErrorRecord } from "./validator.js";
