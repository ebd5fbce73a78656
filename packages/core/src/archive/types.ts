/**
 * Archive extraction types.
 */

import type { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import type { Logger } from "../logging.js";
import type { Matcher } from "../matcher/index.js";

/**
 * Kind of entry an extracted file came from.
 */
export type ArchiveEntryType = "file" | "symlink" | "link" | "other";

/**
 * Metadata the source format exposes for an entry.
 */
export interface ArchiveEntryInfo {
	/** Entry name as stored in the archive, before stripping. */
	name: string;
	/** Uncompressed size in bytes. */
	size: number;
	/** Unix permission and type bits, when stored. */
	mode?: number;
	/** Modification time, when stored. */
	mtime?: Date;
	/** Entry kind. */
	type: ArchiveEntryType;
	/** Link target for symbolic and hard links. */
	linkpath?: string;
}

/**
 * One archive entry that passed filtering, fully buffered.
 */
export interface ExtractedFile {
	/** Effective path, used as the result key. */
	readonly path: string;
	/** Entry metadata. */
	readonly info: Readonly<ArchiveEntryInfo>;
	/** Entry content. */
	readonly data: Buffer;
}

/**
 * Extracted files keyed by effective path. A later entry with the same key
 * replaces an earlier one.
 */
export type ExtractionResult = Map<string, ExtractedFile>;

/**
 * Bytes an archive can be read from.
 */
export type ArchiveSource = Readable | ReadableStream<Uint8Array> | Uint8Array;

/**
 * Options for archive extraction.
 */
export interface ExtractOptions {
	/** Leading path segments dropped from tar entry names (default: 0). */
	stripDepth?: number;
	/** Entries whose effective path fails this predicate are skipped (default: all). */
	include?: Matcher;
	/** Logger for skipped entries and progress. */
	logger?: Logger;
	/** Maximum bytes held in memory, per buffer kind (default: 512 MB). */
	maxSize?: number;
	/** Aborting stops reading the source and rejects with CancellationError. */
	signal?: AbortSignal;
}
