/**
 * Public type exports for @ghfetch/core.
 */

export {
	type HttpHeader,
	type AuthConfig,
	type AuthConfigOptions,
	createAuthConfig,
	getAuthHeaders,
	resolveToken,
} from "./auth.js";
