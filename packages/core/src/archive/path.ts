/**
 * Effective-path resolution for tar entries.
 */

import { ExtractionError } from "../errors.js";

/**
 * Outcome of resolving an entry path against a strip depth.
 */
export type ResolvedEntryPath = { skip: false; path: string } | { skip: true; reason: string };

/**
 * Split on "/" into at most `limit` pieces; the last piece keeps the remainder.
 */
function splitN(value: string, limit: number): string[] {
	const pieces: string[] = [];
	let start = 0;

	while (pieces.length < limit - 1) {
		const index = value.indexOf("/", start);
		if (index === -1) {
			break;
		}
		pieces.push(value.slice(start, index));
		start = index + 1;
	}

	pieces.push(value.slice(start));
	return pieces;
}

/**
 * Check a strip depth before an extraction starts.
 *
 * @throws ExtractionError if the depth is negative or not an integer
 */
export function assertStripDepth(stripDepth: number): void {
	if (!Number.isInteger(stripDepth) || stripDepth < 0) {
		throw new ExtractionError(`Invalid strip depth ${stripDepth}: expected a non-negative integer`);
	}
}

/**
 * Drop `stripDepth` leading segments from an archive path.
 *
 * Only the prefix is removed: everything after the stripped segments is kept
 * as-is, so `owner-repo-sha/src/a.ts` with depth 1 becomes `src/a.ts`. Paths
 * with no more than `stripDepth` segments are skipped.
 *
 * @param rawPath - Entry path as stored in the archive
 * @param stripDepth - Number of leading segments to drop
 * @returns Effective path, or a skip with the reason
 */
export function resolveEntryPath(rawPath: string, stripDepth: number): ResolvedEntryPath {
	assertStripDepth(stripDepth);

	if (stripDepth === 0) {
		return { skip: false, path: rawPath };
	}

	const pieces = splitN(rawPath, stripDepth + 1);
	if (pieces.length <= stripDepth) {
		return {
			skip: true,
			reason: `skipping ${rawPath} from tarball, it is below the stripped folder level ${stripDepth}`,
		};
	}

	return { skip: false, path: pieces[stripDepth] };
}
