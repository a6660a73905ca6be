/**
 * Remote source exports.
 */

export { type RemoteSource, HttpRemoteSource } from "./remote.js";
