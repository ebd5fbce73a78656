/**
 * @title Proxy Configuration Module
 * @description Proxy selection from the standard environment variables.
 *
 * Self-hosted runners often sit behind a corporate proxy. Requests are routed
 * through an undici ProxyAgent when one applies to the request URL.
 *
 * @module http
 *
 * @envvar HTTP_PROXY - Proxy URL for HTTP requests (or http_proxy).
 * @envvar HTTPS_PROXY - Proxy URL for HTTPS requests (or https_proxy).
 * @envvar NO_PROXY - Comma or space-separated hosts that bypass the proxy (or no_proxy).
 *
 * The uppercase variants take precedence over lowercase if both are set.
 *
 * @pattern * - Matches all hosts (disables proxy).
 * @pattern example.com - Matches example.com and its subdomains.
 * @pattern .example.com - Matches example.com and its subdomains.
 */

import { ProxyAgent, type Dispatcher } from "undici";

/**
 * Proxy configuration.
 */
export interface ProxyConfig {
	/** Proxy URL for HTTP requests. */
	httpProxy?: string;
	/** Proxy URL for HTTPS requests. */
	httpsProxy?: string;
	/** Host patterns that bypass the proxy. */
	noProxy: string[];
}

function getProxyEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
	return env[name.toUpperCase()] || env[name.toLowerCase()] || undefined;
}

/**
 * Read proxy configuration from environment variables.
 */
export function getProxyConfig(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
	const noProxy = getProxyEnv(env, "NO_PROXY") ?? "";

	return {
		httpProxy: getProxyEnv(env, "HTTP_PROXY"),
		httpsProxy: getProxyEnv(env, "HTTPS_PROXY"),
		noProxy: noProxy
			.split(/[,\s]+/)
			.map((pattern) => pattern.trim().toLowerCase())
			.filter((pattern) => pattern.length > 0),
	};
}

/**
 * Check if a hostname should bypass the proxy.
 *
 * @param hostname - Hostname to check
 * @param noProxy - NO_PROXY patterns
 * @returns True if the host should bypass the proxy
 */
export function shouldBypassProxy(hostname: string, noProxy: readonly string[]): boolean {
	const host = hostname.toLowerCase();

	return noProxy.some((pattern) => {
		if (pattern === "*") {
			return true;
		}
		const domain = pattern.startsWith(".") ? pattern.slice(1) : pattern;
		return host === domain || host.endsWith(`.${domain}`);
	});
}

/**
 * Get the proxy URL that applies to a request URL.
 *
 * @param url - Request URL
 * @param config - Proxy configuration
 * @returns Proxy URL, or undefined for a direct connection
 */
export function getProxyForUrl(url: string, config: ProxyConfig): string | undefined {
	let parsed: URL;
	try {
		parsed = new URL(url);
	} catch {
		return undefined;
	}

	if (shouldBypassProxy(parsed.hostname, config.noProxy)) {
		return undefined;
	}

	switch (parsed.protocol) {
		case "https:":
			return config.httpsProxy ?? config.httpProxy;
		case "http:":
			return config.httpProxy;
		default:
			return undefined;
	}
}

/**
 * Picks a dispatcher per request URL and owns the ProxyAgents it creates.
 */
export class ProxyRouter {
	private readonly agents = new Map<string, ProxyAgent>();

	constructor(readonly config: ProxyConfig = getProxyConfig()) {}

	/**
	 * Dispatcher for a URL, or undefined when the request goes direct.
	 */
	dispatcherFor(url: string): Dispatcher | undefined {
		const proxyUrl = getProxyForUrl(url, this.config);
		if (!proxyUrl) {
			return undefined;
		}

		let agent = this.agents.get(proxyUrl);
		if (!agent) {
			agent = new ProxyAgent(proxyUrl);
			this.agents.set(proxyUrl, agent);
		}
		return agent;
	}

	/**
	 * Close every agent created so far.
	 */
	async close(): Promise<void> {
		const agents = [...this.agents.values()];
		this.agents.clear();
		await Promise.all(agents.map((agent) => agent.close()));
	}
}
