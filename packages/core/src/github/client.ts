/**
 * @title GitHub Client Module
 * @description Explicitly constructed GitHub API client configuration.
 *
 * Base URL, credentials and request policy are resolved once when the client
 * is created and then passed to every API call.
 *
 * @module github
 */

import { apiUrl as environmentApiUrl } from "../environment/index.js";
import { AuthenticationError, NetworkError, RepositoryNotFoundError } from "../errors.js";
import { ProxyRouter, type HttpOptions, type ProxyConfig } from "../http/index.js";
import { getDefaultLogger, type Logger } from "../logging.js";
import { createAuthConfig, getAuthHeaders, type AuthConfig } from "../types/auth.js";

const DEFAULT_TIMEOUT = 60000;
const DEFAULT_RETRIES = 2;
const DEFAULT_USER_AGENT = "ghfetch";

/**
 * Options for creating a GitHub client.
 */
export interface GitHubClientOptions {
	/** REST API base URL (default: `GITHUB_API_URL`, then https://api.github.com). */
	apiUrl?: string;
	/** Authentication; resolved from the environment when omitted. */
	auth?: AuthConfig;
	/** Request timeout in milliseconds (default: 60000). */
	timeout?: number;
	/** Retry attempts for failed requests (default: 2). */
	retries?: number;
	/** Base delay for retry backoff in milliseconds. */
	retryDelay?: number;
	/** User-Agent header value. */
	userAgent?: string;
	/** Logger for warnings and progress. */
	logger?: Logger;
	/** Proxy configuration; read from the environment when omitted. */
	proxyConfig?: ProxyConfig;
}

/**
 * Resolved client configuration shared by the API calls.
 */
export interface GitHubClient {
	readonly apiUrl: string;
	readonly auth: AuthConfig;
	readonly timeout: number;
	readonly retries: number;
	readonly retryDelay?: number;
	readonly userAgent: string;
	readonly logger: Logger;
	readonly proxy: ProxyRouter;
}

/**
 * Create a GitHub client.
 *
 * @param options - Client options
 * @returns Client configuration
 *
 * @example
 * ```typescript
 * const client = createGitHubClient({ auth: createAuthConfig({ githubToken: token }) });
 * const files = await downloadRepositoryFiles(client, "octocat", "hello-world", "main", matchAll);
 * await closeGitHubClient(client);
 * ```
 */
export function createGitHubClient(options: GitHubClientOptions = {}): GitHubClient {
	return {
		apiUrl: (options.apiUrl ?? environmentApiUrl()).replace(/\/+$/, ""),
		auth: options.auth ?? createAuthConfig(),
		timeout: options.timeout ?? DEFAULT_TIMEOUT,
		retries: options.retries ?? DEFAULT_RETRIES,
		retryDelay: options.retryDelay,
		userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
		logger: options.logger ?? getDefaultLogger(),
		proxy: new ProxyRouter(options.proxyConfig),
	};
}

/**
 * Release the proxy connections held by a client.
 */
export async function closeGitHubClient(client: GitHubClient): Promise<void> {
	await client.proxy.close();
}

/**
 * Request options for a client call.
 *
 * @param client - GitHub client
 * @param accept - Accept header value
 * @param signal - Cancellation signal
 */
export function getRequestOptions(client: GitHubClient, accept: string, signal?: AbortSignal): HttpOptions {
	return {
		headers: {
			Accept: accept,
			"User-Agent": client.userAgent,
			"X-GitHub-Api-Version": "2022-11-28",
			...getAuthHeaders(client.auth, true),
		},
		timeout: client.timeout,
		retries: client.retries,
		retryDelay: client.retryDelay,
		signal,
		proxy: client.proxy,
	};
}

/**
 * Translate authentication and not-found statuses into typed errors.
 */
export function handleGitHubError(error: unknown, resource: string): never {
	if (error instanceof NetworkError) {
		const status = error.statusCode;

		if (status === 401 || status === 403) {
			throw new AuthenticationError(
				`Authentication required for ${resource}. Status: ${status}. ` +
					"The repository may be private or you may have hit the rate limit.",
				{ cause: error },
			);
		}

		if (status === 404) {
			throw new RepositoryNotFoundError(`Not found: ${resource}`, { cause: error });
		}
	}

	throw error;
}
