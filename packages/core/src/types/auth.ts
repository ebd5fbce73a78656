/**
 * Authentication configuration types.
 */

import { getInput } from "../environment/index.js";

/**
 * HTTP header sent with every request.
 */
export interface HttpHeader {
	/** Header name (e.g., "X-Request-Source"). */
	name: string;
	/** Header value. */
	value: string;
}

/**
 * Authentication configuration for API requests.
 */
export interface AuthConfig {
	/** GitHub token; requests are anonymous without one. */
	githubToken?: string;
	/** Extra HTTP headers. */
	httpHeaders: HttpHeader[];
}

/**
 * Options for creating an AuthConfig.
 */
export interface AuthConfigOptions {
	/** GitHub token. */
	githubToken?: string;
	/** HTTP headers in "Name: Value" format. */
	httpHeaders?: string[];
}

/** Action inputs checked for a token, in order. */
const TOKEN_INPUTS = ["github-token", "token"] as const;

/**
 * Resolve a token: `GITHUB_TOKEN`, then the `github-token` and `token`
 * action inputs.
 */
export function resolveToken(): string | undefined {
	const fromEnv = process.env["GITHUB_TOKEN"];
	if (fromEnv) {
		return fromEnv;
	}

	for (const input of TOKEN_INPUTS) {
		const value = getInput(input);
		if (value) {
			return value;
		}
	}

	return undefined;
}

/**
 * Create an AuthConfig from options.
 * Falls back to the environment when no token is provided.
 *
 * @param options - Configuration options
 * @returns AuthConfig object
 * @throws Error if header format is invalid
 */
export function createAuthConfig(options: AuthConfigOptions = {}): AuthConfig {
	const headers: HttpHeader[] = [];

	for (const header of options.httpHeaders ?? []) {
		const colonIndex = header.indexOf(":");

		if (colonIndex === -1) {
			throw new Error(`Invalid header format: "${header}". Expected "Name: Value".`);
		}

		headers.push({
			name: header.substring(0, colonIndex).trim(),
			value: header.substring(colonIndex + 1).trim(),
		});
	}

	return {
		githubToken: options.githubToken ?? resolveToken(),
		httpHeaders: headers,
	};
}

/**
 * Get authorization headers for a request.
 *
 * @param auth - Authentication configuration
 * @param isGitHub - Whether the token may be sent to this host
 * @returns Headers object for fetch
 */
export function getAuthHeaders(auth: AuthConfig | undefined, isGitHub: boolean): Record<string, string> {
	const headers: Record<string, string> = {};

	if (isGitHub && auth?.githubToken) {
		headers["Authorization"] = `Bearer ${auth.githubToken}`;
	}

	if (auth?.httpHeaders) {
		for (const header of auth.httpHeaders) {
			headers[header.name] = header.value;
		}
	}

	return headers;
}
