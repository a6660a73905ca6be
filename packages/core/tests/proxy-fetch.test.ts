import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { fetch as undiciFetch, ProxyAgent, Response as UndiciResponse } from "undici";
import { clearProxyAgents, proxyFetch } from "../src/proxy/fetch.js";

vi.mock("undici", async (importOriginal) => ({
	...(await importOriginal<typeof import("undici")>()),
	fetch: vi.fn(),
	ProxyAgent: vi.fn().mockImplementation(function () {
		return { close: vi.fn().mockResolvedValue(undefined) };
	}),
}));

describe("proxyFetch", () => {
	const globalFetch = vi.fn();

	beforeEach(() => {
		vi.stubGlobal("fetch", globalFetch);
		globalFetch.mockResolvedValue(new Response("direct"));
		vi.mocked(undiciFetch).mockResolvedValue(new UndiciResponse("proxied"));
	});

	afterEach(async () => {
		await clearProxyAgents();
		vi.unstubAllGlobals();
		vi.clearAllMocks();
	});

	it("uses the global fetch when no proxy applies", async () => {
		const response = await proxyFetch("https://example.com/schema.json", { proxyConfig: { noProxy: [] } });

		expect(await response.text()).toBe("direct");
		expect(globalFetch).toHaveBeenCalledWith("https://example.com/schema.json", {});
		expect(undiciFetch).not.toHaveBeenCalled();
	});

	it("routes through a proxy agent when one is configured", async () => {
		const proxyConfig = { httpsProxy: "http://proxy.example.com:8080", noProxy: [] };

		const response = await proxyFetch("https://example.com/schema.json", { method: "GET", proxyConfig });

		expect(await response.text()).toBe("proxied");
		expect(ProxyAgent).toHaveBeenCalledWith("http://proxy.example.com:8080");
		expect(undiciFetch).toHaveBeenCalledWith(
			"https://example.com/schema.json",
			expect.objectContaining({ method: "GET", dispatcher: expect.anything() }),
		);
		expect(globalFetch).not.toHaveBeenCalled();
	});

	it("reuses the agent for the same proxy URL", async () => {
		const proxyConfig = { httpsProxy: "http://proxy.example.com:8080", noProxy: [] };

		await proxyFetch("https://example.com/a.json", { proxyConfig });
		await proxyFetch("https://example.com/b.json", { proxyConfig });

		expect(ProxyAgent).toHaveBeenCalledTimes(1);
	});
});
