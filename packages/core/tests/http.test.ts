import { beforeEach, describe, expect, it, vi } from "vitest";
import { CancellationError, NetworkError } from "../src/errors.js";
import { proxyFetch } from "../src/http/fetch.js";
import { fetchJson, fetchResponse } from "../src/http/request.js";

vi.mock("../src/http/fetch.js", () => ({
	proxyFetch: vi.fn(),
}));

describe("http retry behavior", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	it("retries a transient network error and succeeds", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch
			.mockRejectedValueOnce(new NetworkError("temporary failure"))
			.mockResolvedValueOnce(
				new Response(JSON.stringify({ ok: true }), {
					status: 200,
					headers: { "content-type": "application/json" },
				}),
			);

		const result = await fetchJson<{ ok: boolean }>("https://api.example.test/data", {
			retries: 1,
			retryDelay: 1,
		});

		expect(result).toEqual({ ok: true });
		expect(mockedProxyFetch).toHaveBeenCalledTimes(2);
	});

	it("retries server errors", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch
			.mockResolvedValueOnce(new Response("unavailable", { status: 503, statusText: "Service Unavailable" }))
			.mockResolvedValueOnce(new Response("[]", { status: 200 }));

		const result = await fetchJson<unknown[]>("https://api.example.test/data", { retries: 2, retryDelay: 1 });

		expect(result).toEqual([]);
		expect(mockedProxyFetch).toHaveBeenCalledTimes(2);
	});

	it("does not retry client errors", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockResolvedValue(new Response("missing", { status: 404, statusText: "Not Found" }));

		const request = fetchJson("https://api.example.test/data", { retries: 3, retryDelay: 1 });

		await expect(request).rejects.toThrow("HTTP 404: Not Found");
		expect(mockedProxyFetch).toHaveBeenCalledTimes(1);
	});

	it("turns fetch TypeErrors into network errors", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockRejectedValue(new TypeError("fetch failed"));

		const request = fetchResponse("https://api.example.test/data", { retries: 0 });

		await expect(request).rejects.toThrow("Request to https://api.example.test/data failed: fetch failed");
	});

	it("cancels while waiting for retry backoff", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockRejectedValue(new NetworkError("transient error"));

		const controller = new AbortController();
		const request = fetchJson("https://api.example.test/data", {
			retries: 3,
			retryDelay: 1000,
			signal: controller.signal,
		});

		await Promise.resolve();
		controller.abort();

		await expect(request).rejects.toBeInstanceOf(CancellationError);
		expect(mockedProxyFetch).toHaveBeenCalledTimes(1);
	});

	it("does not send a request when already cancelled", async () => {
		const controller = new AbortController();
		controller.abort();

		await expect(fetchResponse("https://api.example.test/data", { signal: controller.signal })).rejects.toBeInstanceOf(
			CancellationError,
		);
		expect(vi.mocked(proxyFetch)).not.toHaveBeenCalled();
	});
});

describe("fetchResponse", () => {
	beforeEach(() => {
		vi.resetAllMocks();
	});

	it("returns the response with its body unread", async () => {
		vi.mocked(proxyFetch).mockResolvedValue(new Response("payload", { status: 200 }));

		const response = await fetchResponse("https://api.example.test/file");

		expect(response.bodyUsed).toBe(false);
		expect(await response.text()).toBe("payload");
	});

	it("merges caller headers over the defaults", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockResolvedValue(new Response("", { status: 200 }));

		await fetchResponse("https://api.example.test/file", { headers: { "User-Agent": "custom", Accept: "*/*" } });

		expect(mockedProxyFetch.mock.calls[0]?.[1]?.headers).toEqual({ "User-Agent": "custom", Accept: "*/*" });
	});

	it("returns error statuses to the caller on request", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockResolvedValue(new Response("missing", { status: 404, statusText: "Not Found" }));

		const response = await fetchResponse("https://api.example.test/file", { returnErrorStatus: true, retries: 3 });

		expect(response.status).toBe(404);
		expect(mockedProxyFetch).toHaveBeenCalledTimes(1);
	});

	it("retries server errors before returning their status", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockImplementation(async () => new Response("busy", { status: 502, statusText: "Bad Gateway" }));

		const response = await fetchResponse("https://api.example.test/file", {
			returnErrorStatus: true,
			retries: 2,
			retryDelay: 1,
		});

		expect(response.status).toBe(502);
		expect(mockedProxyFetch).toHaveBeenCalledTimes(3);
	});

	it("returns redirects when redirects are handled manually", async () => {
		const mockedProxyFetch = vi.mocked(proxyFetch);
		mockedProxyFetch.mockResolvedValue(
			new Response(null, { status: 302, headers: { location: "https://blobs.example.test/a.zip" } }),
		);

		const response = await fetchResponse("https://api.example.test/zip", { redirect: "manual" });

		expect(response.status).toBe(302);
		expect(mockedProxyFetch.mock.calls[0]?.[1]?.redirect).toBe("manual");
	});
});
