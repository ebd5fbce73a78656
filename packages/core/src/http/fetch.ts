/**
 * @title Proxy-Aware Fetch Module
 * @description Fetch wrapper that routes through a proxy when one applies.
 *
 * @module http
 */

import { fetch as undiciFetch } from "undici";
import type { ProxyRouter } from "./proxy.js";

/**
 * Request settings understood by both the global fetch and undici's.
 */
export interface ProxyFetchInit {
	method?: string;
	headers?: Record<string, string>;
	redirect?: "follow" | "manual" | "error";
	signal?: AbortSignal;
	/** Proxy routing; direct connection when omitted. */
	proxy?: ProxyRouter;
}

/**
 * Proxy-aware fetch function.
 *
 * Uses undici's fetch with a ProxyAgent when the router selects a proxy for
 * the URL, and the global fetch otherwise.
 *
 * @param url - URL to fetch
 * @param init - Request settings
 * @returns Response
 */
export async function proxyFetch(url: string, init: ProxyFetchInit = {}): Promise<Response> {
	const { proxy, ...requestInit } = init;
	const dispatcher = proxy?.dispatcherFor(url);

	if (dispatcher) {
		// undici's Response is its own implementation of the Fetch API Response;
		// it is compatible at runtime but typed separately from the global one.
		return undiciFetch(url, { ...requestInit, dispatcher }) as unknown as Response;
	}

	return fetch(url, requestInit);
}
