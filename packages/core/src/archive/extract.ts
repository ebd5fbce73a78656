/**
 * Unified archive extraction.
 */

import { TransportError } from "../errors.js";
import { getDefaultLogger } from "../logging.js";
import { matchAll } from "../matcher/index.js";
import { detectArchiveFormat } from "./format.js";
import { DEFAULT_MAX_SIZE, SizeBudget } from "./limits.js";
import { assertStripDepth } from "./path.js";
import { readAll, toReadable } from "./source.js";
import { extractTar } from "./tar.js";
import type { ArchiveSource, ExtractOptions, ExtractionResult } from "./types.js";
import { extractZip } from "./zip.js";

/**
 * Extract the entries selected by `include` from an archive stream.
 *
 * The container format comes from the declared content type:
 * `application/gzip` and `application/x-gzip` are read as gzip-compressed
 * tar, `application/zip` as ZIP, anything else as plain tar. `stripDepth`
 * applies to tar entries only.
 *
 * @param source - Archive bytes
 * @param contentType - Declared content type of the bytes
 * @param options - Extraction options
 * @returns Extracted files keyed by effective path
 * @throws TransportError if the stream cannot be read or decompressed
 * @throws ContainerFormatError if the tar or zip structure is corrupt
 * @throws CancellationError if `options.signal` aborts
 *
 * @example
 * ```typescript
 * const files = await extractArchive(response.body, "application/x-gzip", {
 *   stripDepth: 1,
 *   include: matchesOneOf(["^docs/"]),
 * });
 * ```
 */
export async function extractArchive(
	source: ArchiveSource,
	contentType: string | null | undefined,
	options: ExtractOptions = {},
): Promise<ExtractionResult> {
	const {
		stripDepth = 0,
		include = matchAll,
		logger = getDefaultLogger(),
		maxSize = DEFAULT_MAX_SIZE,
		signal,
	} = options;

	assertStripDepth(stripDepth);

	const format = detectArchiveFormat(contentType);
	const input = toReadable(source);
	const budget = new SizeBudget(maxSize, "Extracted content");

	switch (format) {
		case "zip": {
			const archive = await readAll(input, new SizeBudget(maxSize, "Zip archive"), signal);
			return extractZip(archive, { include, logger, budget, signal });
		}
		case "gzip-tar":
			return extractTar(input, { gzip: true, stripDepth, include, logger, budget, signal });
		case "tar":
			return extractTar(input, { gzip: false, stripDepth, include, logger, budget, signal });
	}
}

/**
 * Extract an HTTP response body, dispatching on its `Content-Type` header.
 *
 * @param response - Response whose body is an archive
 * @param options - Extraction options
 * @returns Extracted files keyed by effective path
 */
export async function readArchiveResponse(response: Response, options: ExtractOptions = {}): Promise<ExtractionResult> {
	if (!response.body) {
		throw new TransportError("No response body received");
	}

	return extractArchive(response.body, response.headers.get("content-type"), options);
}
