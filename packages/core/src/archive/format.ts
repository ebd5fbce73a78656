/**
 * Archive format detection from a declared content type.
 */

/**
 * Container formats the extractor can read.
 */
export type ArchiveFormat = "gzip-tar" | "zip" | "tar";

const CONTENT_TYPE_FORMATS: ReadonlyMap<string, ArchiveFormat> = new Map<string, ArchiveFormat>([
	["application/gzip", "gzip-tar"],
	["application/x-gzip", "gzip-tar"],
	["application/zip", "zip"],
]);

/**
 * Map a `Content-Type` value to an archive format.
 *
 * Parameters after `;` are ignored and the comparison is case-insensitive.
 * Missing or unknown types are read as an uncompressed tar stream.
 *
 * @param contentType - Declared content type
 * @returns Archive format
 */
export function detectArchiveFormat(contentType: string | null | undefined): ArchiveFormat {
	const mediaType = (contentType ?? "").split(";")[0].trim().toLowerCase();
	return CONTENT_TYPE_FORMATS.get(mediaType) ?? "tar";
}
