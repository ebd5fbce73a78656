/**
 * @title Errors
 * @description Error types for @ghfetch/core.
 *
 * Fatal extraction failures, HTTP failures and lookup failures each get their
 * own class so callers can branch with `instanceof` or on `code`.
 *
 * @module errors
 */

/**
 * Options for constructing a GhFetchError.
 */
export interface GhFetchErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all ghfetch errors.
 */
export class GhFetchError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: GhFetchErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "GhFetchError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name}: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * The archive byte stream could not be read, or its decoder could not be set up
 * (for example a gzip stream with a bad header).
 */
export class TransportError extends GhFetchError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "TRANSPORT_ERROR", { cause: options?.cause });
		this.name = "TransportError";
	}
}

/**
 * Structural corruption in tar headers or in a zip central directory.
 */
export class ContainerFormatError extends GhFetchError {
	/** Archive format that failed to parse. */
	readonly archiveFormat?: string;

	constructor(message: string, options?: { archiveFormat?: string; cause?: unknown }) {
		super(message, "CONTAINER_FORMAT_ERROR", { cause: options?.cause });
		this.name = "ContainerFormatError";
		this.archiveFormat = options?.archiveFormat;
	}
}

/**
 * More bytes would be held in memory than the extraction allows.
 */
export class ArchiveSizeError extends GhFetchError {
	/** Configured limit in bytes. */
	readonly maxSize: number;

	constructor(message: string, maxSize: number) {
		super(message, "ARCHIVE_SIZE_ERROR", {
			suggestion: "Narrow the include patterns or raise the maxSize option",
		});
		this.name = "ArchiveSizeError";
		this.maxSize = maxSize;
	}
}

/**
 * Invalid arguments passed to an extraction.
 */
export class ExtractionError extends GhFetchError {
	constructor(message: string, options?: GhFetchErrorOptions) {
		super(message, "EXTRACTION_ERROR", options);
		this.name = "ExtractionError";
	}
}

/**
 * No workflow-run artifact with the requested name exists.
 */
export class ArtifactNotFoundError extends GhFetchError {
	/** Requested artifact name. */
	readonly artifactName: string;

	constructor(message: string, artifactName: string) {
		super(message, "ARTIFACT_NOT_FOUND", {
			suggestion: "Check that the artifact was uploaded earlier in the same workflow run",
		});
		this.name = "ArtifactNotFoundError";
		this.artifactName = artifactName;
	}
}

/**
 * Error when a repository or API resource is not found.
 */
export class RepositoryNotFoundError extends GhFetchError {
	constructor(message: string, options?: { suggestion?: string; cause?: unknown }) {
		super(message, "NOT_FOUND", {
			suggestion: options?.suggestion ?? "Check if the repository exists and you have access to it",
			cause: options?.cause,
		});
		this.name = "RepositoryNotFoundError";
	}
}

/**
 * Error when authentication is required or failed.
 */
export class AuthenticationError extends GhFetchError {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, "AUTH_ERROR", {
			suggestion: "Provide a token via the GITHUB_TOKEN environment variable or the github-token input",
			cause: options?.cause,
		});
		this.name = "AuthenticationError";
	}
}

/**
 * Error related to network operations.
 */
export class NetworkError extends GhFetchError {
	/** HTTP status code if available. */
	readonly statusCode?: number;

	constructor(message: string, options?: { statusCode?: number; cause?: unknown }) {
		super(message, "NETWORK_ERROR", {
			suggestion: "Check your internet connection and try again",
			cause: options?.cause,
		});
		this.name = "NetworkError";
		this.statusCode = options?.statusCode;
	}
}

/**
 * Error thrown when the caller aborts an operation through its AbortSignal.
 */
export class CancellationError extends GhFetchError {
	constructor(message = "Operation cancelled.") {
		super(message, "CANCELLED");
		this.name = "CancellationError";
	}
}

/**
 * Check if an error is a CancellationError.
 */
export function isCancellationError(error: unknown): error is CancellationError {
	return error instanceof CancellationError;
}

/**
 * Check if an error is a GhFetchError.
 */
export function isGhFetchError(error: unknown): error is GhFetchError {
	return error instanceof GhFetchError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a GhFetchError.
 */
export function wrapError(error: unknown, context?: string): GhFetchError {
	if (isGhFetchError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new GhFetchError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
