/**
 * HTTP module exports.
 */

export { type HttpOptions, fetchJson, fetchResponse } from "./request.js";

export { type ProxyFetchInit, proxyFetch } from "./fetch.js";

export { type ProxyConfig, ProxyRouter, getProxyConfig, getProxyForUrl, shouldBypassProxy } from "./proxy.js";
