/**
 * @ghfetch/core - Selective in-memory extraction of GitHub archives.
 *
 * This library provides functionality for:
 * - Archive extraction (gzip tar, zip and plain tar, chosen by content type)
 * - Path matching (regular expressions, globs)
 * - GitHub integration (repository tarballs, workflow-run artifacts)
 * - Workflow environment access (GITHUB_* variables, action inputs)
 */

// Type exports
export * from "./types/index.js";

// Error exports
export {
	GhFetchError,
	TransportError,
	ContainerFormatError,
	ArchiveSizeError,
	ExtractionError,
	ArtifactNotFoundError,
	RepositoryNotFoundError,
	AuthenticationError,
	NetworkError,
	CancellationError,
	isGhFetchError,
	isCancellationError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Logging exports
export {
	type LogLevel,
	type Logger,
	LOG_LEVELS,
	createConsoleLogger,
	getDefaultLogger,
	resolveLogLevel,
	silentLogger,
} from "./logging.js";

// Matcher exports
export * from "./matcher/index.js";

// Archive exports
export * from "./archive/index.js";

// Environment exports
export * as environment from "./environment/index.js";

// HTTP exports
export * from "./http/index.js";

// GitHub exports
export * from "./github/index.js";
