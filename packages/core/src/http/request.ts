/**
 * @title HTTP Utilities Module
 * @description HTTP requests with timeout, retry and cancellation support.
 *
 * @module http
 */

import { CancellationError, NetworkError } from "../errors.js";
import { proxyFetch } from "./fetch.js";
import type { ProxyRouter } from "./proxy.js";

/**
 * Options for HTTP requests.
 */
export interface HttpOptions {
	/** Timeout until response headers arrive, in milliseconds (default: 30000). */
	timeout?: number;
	/** Number of retry attempts (default: 3). */
	retries?: number;
	/** Base delay for exponential backoff in ms (default: 1000). */
	retryDelay?: number;
	/** Custom headers to include. */
	headers?: Record<string, string>;
	/** AbortSignal for cancellation. */
	signal?: AbortSignal;
	/** Redirect handling (default: "follow"). With "manual", 3xx responses are returned. */
	redirect?: "follow" | "manual";
	/** Proxy routing. */
	proxy?: ProxyRouter;
	/**
	 * Return non-2xx responses instead of throwing NetworkError. Retryable
	 * statuses (5xx, 429) are still retried while attempts remain.
	 */
	returnErrorStatus?: boolean;
}

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_RETRIES = 3;
const DEFAULT_RETRY_DELAY = 1000;

/**
 * Fetch with timeout support.
 */
async function fetchWithTimeout(
	url: string,
	headers: Record<string, string>,
	options: HttpOptions,
	timeout: number,
): Promise<Response> {
	const { signal: externalSignal, redirect = "follow", proxy } = options;

	if (externalSignal?.aborted) {
		throw new CancellationError();
	}

	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeout);

	// Link external signal to internal controller so callers can cancel
	const onExternalAbort = () => controller.abort();
	externalSignal?.addEventListener("abort", onExternalAbort, { once: true });

	try {
		return await proxyFetch(url, {
			method: "GET",
			headers,
			redirect,
			signal: controller.signal,
			proxy,
		});
	} catch (error) {
		if (error instanceof Error && error.name === "AbortError") {
			// Distinguish user cancellation from timeout
			if (externalSignal?.aborted) {
				throw new CancellationError();
			}
			throw new NetworkError(`Request timed out after ${timeout}ms`, { cause: error });
		}
		if (error instanceof TypeError) {
			throw new NetworkError(`Request to ${url} failed: ${error.message}`, { cause: error });
		}
		throw error;
	} finally {
		clearTimeout(timeoutId);
		externalSignal?.removeEventListener("abort", onExternalAbort);
	}
}

/**
 * Check if an error is retryable.
 */
function isRetryableError(error: unknown): boolean {
	if (error instanceof NetworkError) {
		const statusCode = error.statusCode;
		if (statusCode) {
			return isRetryableStatus(statusCode);
		}
		return true;
	}
	return false;
}

function isRetryableStatus(status: number): boolean {
	return status >= 500 || status === 429;
}

/**
 * Sleep for a given number of milliseconds, rejecting if the signal aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancellationError());
			return;
		}

		const onAbort = () => {
			clearTimeout(timeoutId);
			reject(new CancellationError());
		};
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);

		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

function isAcceptedStatus(response: Response, redirect: "follow" | "manual"): boolean {
	if (response.ok) {
		return true;
	}
	return redirect === "manual" && response.status >= 300 && response.status < 400;
}

/**
 * Fetch with retry support and a response processor.
 *
 * @param url - URL to fetch
 * @param requestHeaders - Headers to send
 * @param processResponse - Callback to extract the desired value from the response
 * @param options - HTTP options
 * @returns Processed response value
 */
async function fetchWithRetry<T>(
	url: string,
	requestHeaders: Record<string, string>,
	processResponse: (response: Response) => Promise<T>,
	options: HttpOptions = {},
): Promise<T> {
	const {
		timeout = DEFAULT_TIMEOUT,
		retries = DEFAULT_RETRIES,
		retryDelay = DEFAULT_RETRY_DELAY,
		headers = {},
		signal,
		redirect = "follow",
		returnErrorStatus = false,
	} = options;

	let lastError: Error | undefined;

	for (let attempt = 0; attempt <= retries; attempt++) {
		try {
			const response = await fetchWithTimeout(url, { ...requestHeaders, ...headers }, options, timeout);

			if (!isAcceptedStatus(response, redirect)) {
				const willRetry = attempt < retries && isRetryableStatus(response.status);
				if (returnErrorStatus && !willRetry) {
					return await processResponse(response);
				}
				await response.body?.cancel();
				throw new NetworkError(`HTTP ${response.status}: ${response.statusText}`, { statusCode: response.status });
			}

			return await processResponse(response);
		} catch (error) {
			lastError = error instanceof Error ? error : new Error(String(error));

			if (attempt < retries && isRetryableError(error)) {
				await sleep(retryDelay * Math.pow(2, attempt), signal);
				continue;
			}

			throw error;
		}
	}

	throw lastError ?? new NetworkError("Request failed after all retries");
}

/**
 * Fetch JSON with timeout and retry support.
 *
 * @param url - URL to fetch
 * @param options - HTTP options
 * @returns Parsed JSON response
 */
export async function fetchJson<T>(url: string, options: HttpOptions = {}): Promise<T> {
	return fetchWithRetry<T>(
		url,
		{ Accept: "application/json", "User-Agent": "ghfetch" },
		(response) => response.json() as Promise<T>,
		options,
	);
}

/**
 * Fetch a response without consuming its body, for streaming downloads and
 * redirect inspection. Retries only cover the time until headers arrive.
 *
 * @param url - URL to fetch
 * @param options - HTTP options
 * @returns Response with an unread body
 */
export async function fetchResponse(url: string, options: HttpOptions = {}): Promise<Response> {
	return fetchWithRetry<Response>(url, { "User-Agent": "ghfetch" }, async (response) => response, options);
}
