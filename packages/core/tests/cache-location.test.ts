import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { FileCacheLocation, getDefaultCacheDir } from "../src/cache/location.js";

describe("FileCacheLocation", () => {
	let tempDir: string;
	let location: FileCacheLocation;

	beforeEach(async () => {
		tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "lazyschema-cache-test-"));
		location = new FileCacheLocation(path.join(tempDir, "cache"));
	});

	afterEach(async () => {
		await fs.promises.rm(tempDir, { recursive: true, force: true });
	});

	describe("resolve", () => {
		it("joins the key onto the directory", () => {
			expect(location.resolve("schema.json")).toBe(path.join(tempDir, "cache", "schema.json"));
		});

		it("rejects keys escaping the directory", () => {
			expect(() => location.resolve("../outside.json")).toThrow(RangeError);
			expect(() => location.resolve("")).toThrow(RangeError);
		});
	});

	describe("createExclusive", () => {
		it("creates the directory and writes the file", async () => {
			await location.createExclusive("schema.json", '{"type":"object"}');

			expect(await fs.promises.readFile(location.resolve("schema.json"), "utf-8")).toBe('{"type":"object"}');
		});

		it("refuses to overwrite an existing file", async () => {
			await location.createExclusive("schema.json", "first");

			await expect(location.createExclusive("schema.json", "second")).rejects.toMatchObject({ code: "EEXIST" });
			expect(Buffer.from(await location.read("schema.json")).toString("utf-8")).toBe("first");
		});
	});

	describe("exists", () => {
		it("reports missing and present entries", async () => {
			expect(await location.exists("schema.json")).toBe(false);

			await location.createExclusive("schema.json", "{}");

			expect(await location.exists("schema.json")).toBe(true);
		});
	});

	describe("read", () => {
		it("returns the raw bytes of an entry", async () => {
			await fs.promises.mkdir(location.directory, { recursive: true });
			await fs.promises.writeFile(location.resolve("schema.json"), Buffer.from([0x7b, 0xff, 0x7d]));

			expect([...(await location.read("schema.json"))]).toEqual([0x7b, 0xff, 0x7d]);
		});

		it("rejects with ENOENT for a missing entry", async () => {
			await expect(location.read("schema.json")).rejects.toMatchObject({ code: "ENOENT" });
		});
	});

	describe("remove", () => {
		it("deletes an existing entry", async () => {
			await location.createExclusive("schema.json", "{}");

			await location.remove("schema.json");

			expect(await location.exists("schema.json")).toBe(false);
		});

		it("does not throw for a missing entry", async () => {
			await expect(location.remove("schema.json")).resolves.toBeUndefined();
		});
	});
});

describe("getDefaultCacheDir", () => {
	it("ends with the application directory", () => {
		const dir = getDefaultCacheDir();

		expect(dir.split(path.sep)).toContain("lazyschema");
	});
});
