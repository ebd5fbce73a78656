/**
 * @title ZIP Archive Extraction Module
 * @description In-memory ZIP extraction over a buffered archive.
 *
 * The central directory sits at the end of a ZIP file, so the whole archive
 * is buffered before any entry can be located. Entry names are used as
 * stored; no leading segments are stripped.
 *
 * @module archive
 */

import * as unzipper from "unzipper";
import { CancellationError, ContainerFormatError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logging.js";
import type { Matcher } from "../matcher/index.js";
import type { SizeBudget } from "./limits.js";
import type { ArchiveEntryType, ExtractionResult } from "./types.js";

/**
 * Options for ZIP extraction.
 */
export interface ZipExtractOptions {
	/** Inclusion predicate over stored entry names. */
	include: Matcher;
	/** Logger for progress. */
	logger: Logger;
	/** Budget charged for buffered entry content. */
	budget: SizeBudget;
	/** Checked before each entry is inflated. */
	signal?: AbortSignal;
}

const S_IFMT = 0o170000;
const S_IFDIR = 0o040000;
const S_IFLNK = 0o120000;

/**
 * Extract matching entries from a buffered ZIP archive, in central directory order.
 *
 * @param archive - Complete ZIP archive
 * @param options - Extraction options
 * @returns Extracted files keyed by stored name
 * @throws ContainerFormatError if the central directory or an entry is corrupt
 * @throws CancellationError if the signal aborts between entries
 */
export async function extractZip(archive: Buffer, options: ZipExtractOptions): Promise<ExtractionResult> {
	const { include, logger, budget, signal } = options;

	const directory = await unzipper.Open.buffer(archive).catch((error: unknown) => {
		throw new ContainerFormatError(`Invalid zip archive: ${getErrorMessage(error)}`, {
			archiveFormat: "zip",
			cause: error,
		});
	});

	const files: ExtractionResult = new Map();

	for (const file of directory.files) {
		// The Unix mode is stored in the upper 16 bits of externalFileAttributes.
		const unixMode = (file.externalFileAttributes >>> 16) & 0xffff;

		if (file.type === "Directory" || (unixMode & S_IFMT) === S_IFDIR) {
			continue;
		}

		if (!include(file.path)) {
			continue;
		}

		if (signal?.aborted) {
			throw new CancellationError();
		}

		logger.debug(`Extracting ${file.path}`);

		const data = await file.buffer().catch((error: unknown) => {
			throw new ContainerFormatError(`Failed to read zip entry "${file.path}": ${getErrorMessage(error)}`, {
				archiveFormat: "zip",
				cause: error,
			});
		});

		const exceeded = budget.consume(data.length);
		if (exceeded) {
			throw exceeded;
		}

		const type: ArchiveEntryType = (unixMode & S_IFMT) === S_IFLNK ? "symlink" : "file";

		files.set(file.path, {
			path: file.path,
			info: {
				name: file.path,
				size: data.length,
				mode: unixMode === 0 ? undefined : unixMode,
				mtime: file.lastModifiedDateTime,
				type,
			},
			data,
		});
	}

	return files;
}
