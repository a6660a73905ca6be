/**
 * @title Cache Location Module
 * @description Resolution of logical cache keys to files on disk.
 *
 * A cache location maps names such as "schema.json" to paths inside a
 * single cache directory and offers the handful of file operations the
 * schema store needs.
 *
 * @module cache
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";

/** Application directory name used under the platform cache root. */
const APP_DIR = "lazyschema";

/**
 * Storage backing a set of named cache entries.
 */
export interface CacheLocation {
	/** Absolute path for a cache key. */
	resolve(name: string): string;
	/** Whether an entry exists. */
	exists(name: string): Promise<boolean>;
	/** Read the raw bytes of an entry. Rejects with the filesystem error. */
	read(name: string): Promise<Uint8Array>;
	/**
	 * Write an entry only if it does not exist yet.
	 * Rejects with an `EEXIST` error when it does.
	 */
	createExclusive(name: string, content: string): Promise<void>;
	/** Delete an entry if present. */
	remove(name: string): Promise<void>;
}

/**
 * Get the default cache directory.
 *
 * @returns Path to cache directory
 */
export function getDefaultCacheDir(): string {
	switch (process.platform) {
		case "darwin":
			return path.join(os.homedir(), "Library", "Caches", APP_DIR);
		case "win32":
			return path.join(process.env["LOCALAPPDATA"] ?? path.join(os.homedir(), "AppData", "Local"), APP_DIR, "cache");
		default:
			return path.join(process.env["XDG_CACHE_HOME"] ?? path.join(os.homedir(), ".cache"), APP_DIR);
	}
}

/**
 * Cache location backed by a directory on the local filesystem.
 * The directory is created lazily on first write.
 */
export class FileCacheLocation implements CacheLocation {
	readonly directory: string;

	constructor(directory: string = getDefaultCacheDir()) {
		this.directory = path.resolve(directory);
	}

	resolve(name: string): string {
		const resolved = path.resolve(this.directory, name);
		const relative = path.relative(this.directory, resolved);
		if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
			throw new RangeError(`Cache key "${name}" resolves outside ${this.directory}`);
		}
		return resolved;
	}

	async exists(name: string): Promise<boolean> {
		try {
			await fs.promises.access(this.resolve(name), fs.constants.F_OK);
			return true;
		} catch (error) {
			if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
				return false;
			}
			throw error;
		}
	}

	async read(name: string): Promise<Uint8Array> {
		return fs.promises.readFile(this.resolve(name));
	}

	async createExclusive(name: string, content: string): Promise<void> {
		const target = this.resolve(name);
		await fs.promises.mkdir(path.dirname(target), { recursive: true });
		await fs.promises.writeFile(target, content, { encoding: "utf-8", flag: "wx" });
	}

	async remove(name: string): Promise<void> {
		await fs.promises.rm(this.resolve(name), { force: true });
	}
}
