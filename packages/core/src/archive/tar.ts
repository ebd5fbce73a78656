/**
 * Streaming tar extraction into memory.
 */

import { createGunzip } from "node:zlib";
import type { Readable } from "node:stream";
import * as tar from "tar";
import {
	CancellationError,
	ContainerFormatError,
	getErrorMessage,
	TransportError,
	type GhFetchError,
} from "../errors.js";
import type { Logger } from "../logging.js";
import type { Matcher } from "../matcher/index.js";
import type { SizeBudget } from "./limits.js";
import { resolveEntryPath } from "./path.js";
import { toBuffer } from "./source.js";
import type { ArchiveEntryType, ExtractionResult } from "./types.js";

/**
 * Options for tar extraction.
 */
export interface TarExtractOptions {
	/** Decompress the input with gunzip before parsing. */
	gzip: boolean;
	/** Leading path segments to drop. */
	stripDepth: number;
	/** Inclusion predicate over effective paths. */
	include: Matcher;
	/** Logger for skipped entries and progress. */
	logger: Logger;
	/** Budget charged for buffered entry content. */
	budget: SizeBudget;
	/** Aborting stops reading and rejects with CancellationError. */
	signal?: AbortSignal;
}

/** Records that only carry metadata for other entries. */
const METADATA_ENTRY_TYPES: ReadonlySet<string> = new Set([
	"ExtendedHeader",
	"GlobalExtendedHeader",
	"OldExtendedHeader",
	"NextFileHasLongPath",
	"NextFileHasLongLinkpath",
	"OldGnuLongPath",
]);

function isZeroFilled(chunk: Buffer): boolean {
	return chunk.every((byte) => byte === 0);
}

function entryType(type: string): ArchiveEntryType {
	switch (type) {
		case "File":
		case "OldFile":
		case "ContiguousFile":
			return "file";
		case "SymbolicLink":
			return "symlink";
		case "Link":
			return "link";
		default:
			return "other";
	}
}

/**
 * Extract matching entries from a (possibly gzip-compressed) tar stream.
 *
 * Entries are read in order; skipped and unmatched entries are drained
 * without being buffered. Any decoding or parsing failure rejects the whole
 * extraction. A stream that holds no entries (empty, or only end-of-archive
 * zero blocks) yields an empty result.
 *
 * @param source - Archive bytes
 * @param options - Extraction options
 * @returns Extracted files keyed by effective path
 */
export function extractTar(source: Readable, options: TarExtractOptions): Promise<ExtractionResult> {
	const { gzip, stripDepth, include, logger, budget, signal } = options;
	const label = gzip ? "gzip-tar" : "tar";

	return new Promise<ExtractionResult>((resolve, reject) => {
		const files: ExtractionResult = new Map();
		const parser = new tar.Parser({ strict: true });
		const decoded: Readable = gzip ? source.pipe(createGunzip()) : source;
		let settled = false;
		let sawEntry = false;
		let zeroFilled = true;

		const onAbort = () => fail(new CancellationError());

		const release = () => {
			settled = true;
			signal?.removeEventListener("abort", onAbort);
		};

		const fail = (error: GhFetchError) => {
			if (settled) {
				return;
			}
			release();
			source.unpipe();
			source.destroy();
			decoded.destroy();
			reject(error);
		};

		if (signal?.aborted) {
			fail(new CancellationError());
			return;
		}
		signal?.addEventListener("abort", onAbort, { once: true });

		parser.on("entry", (entry: tar.ReadEntry) => {
			sawEntry = true;
			if (settled || METADATA_ENTRY_TYPES.has(entry.type) || entry.type === "Directory") {
				entry.resume();
				return;
			}

			const resolved = resolveEntryPath(entry.path, stripDepth);
			if (resolved.skip) {
				logger.warn(resolved.reason);
				entry.resume();
				return;
			}

			if (!include(resolved.path)) {
				entry.resume();
				return;
			}

			logger.debug(`Extracting ${entry.path}`);
			const chunks: Buffer[] = [];

			entry.on("data", (chunk: Buffer) => {
				const exceeded = budget.consume(chunk.length);
				if (exceeded) {
					fail(exceeded);
					return;
				}
				chunks.push(chunk);
			});

			entry.on("end", () => {
				if (settled) {
					return;
				}
				files.set(resolved.path, {
					path: resolved.path,
					info: {
						name: entry.path,
						size: entry.size,
						mode: entry.mode,
						mtime: entry.mtime,
						type: entryType(entry.type),
						linkpath: entry.linkpath,
					},
					data: Buffer.concat(chunks),
				});
			});
		});

		parser.on("error", (error: unknown) => {
			// node-tar reports an archive without a single header as unrecognised.
			if (!sawEntry && zeroFilled) {
				if (!settled) {
					release();
					source.destroy();
					decoded.destroy();
					resolve(files);
				}
				return;
			}
			fail(
				new ContainerFormatError(`Invalid ${label} archive: ${getErrorMessage(error)}`, {
					archiveFormat: label,
					cause: error,
				}),
			);
		});

		parser.on("end", () => {
			if (!settled) {
				release();
				resolve(files);
			}
		});

		parser.on("drain", () => decoded.resume());

		source.on("error", (error) => {
			fail(new TransportError(`Failed to read archive stream: ${getErrorMessage(error)}`, { cause: error }));
		});

		if (decoded !== source) {
			decoded.on("error", (error) => {
				fail(new TransportError(`Failed to decompress gzip stream: ${getErrorMessage(error)}`, { cause: error }));
			});
		}

		decoded.on("data", (chunk: Buffer | Uint8Array | string) => {
			const buffer = toBuffer(chunk);
			zeroFilled = zeroFilled && isZeroFilled(buffer);
			if (!parser.write(buffer)) {
				decoded.pause();
			}
		});

		decoded.on("end", () => {
			parser.end();
		});
	});
}
