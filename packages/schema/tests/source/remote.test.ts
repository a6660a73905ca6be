import { beforeEach, describe, expect, it, vi } from "vitest";
import { fetchText } from "@lazyschema/core";
import { HttpRemoteSource } from "../../src/source/remote.js";

vi.mock("@lazyschema/core", async (importOriginal) => ({
	...(await importOriginal<typeof import("@lazyschema/core")>()),
	fetchText: vi.fn(),
}));

describe("HttpRemoteSource", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	it("downloads the URL once with the configured timeout", async () => {
		const mockedFetchText = vi.mocked(fetchText);
		mockedFetchText.mockResolvedValueOnce('{"type":"object"}');
		const source = new HttpRemoteSource("https://example.com/schema.json", { timeout: 500 });

		await expect(source.fetchText()).resolves.toBe('{"type":"object"}');
		expect(mockedFetchText).toHaveBeenCalledTimes(1);
		expect(mockedFetchText).toHaveBeenCalledWith("https://example.com/schema.json", {
			timeout: 500,
			headers: { Accept: "application/json" },
		});
	});

	it("exposes its URL", () => {
		expect(new HttpRemoteSource("https://example.com/schema.json").url).toBe("https://example.com/schema.json");
	});
});
