/**
 * Archive module exports.
 */

export {
	type ArchiveEntryType,
	type ArchiveEntryInfo,
	type ExtractedFile,
	type ExtractionResult,
	type ArchiveSource,
	type ExtractOptions,
} from "./types.js";

export { type ArchiveFormat, detectArchiveFormat } from "./format.js";

export { type ResolvedEntryPath, resolveEntryPath } from "./path.js";

export { DEFAULT_MAX_SIZE, formatSize } from "./limits.js";

export { extractArchive, readArchiveResponse } from "./extract.js";
