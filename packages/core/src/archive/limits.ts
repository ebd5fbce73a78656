/**
 * @title Archive Limits Module
 * @description Memory accounting for in-memory extraction.
 *
 * Every buffered byte is charged against a budget so that an unexpectedly
 * large archive fails instead of exhausting the heap.
 *
 * @module archive
 */

import { ArchiveSizeError } from "../errors.js";

/** Default maximum size held in memory: 512 MB. */
export const DEFAULT_MAX_SIZE = 512 * 1024 * 1024;

/**
 * Running total of bytes held in memory against a fixed limit.
 */
export class SizeBudget {
	private used = 0;

	constructor(
		readonly maxSize: number,
		private readonly label: string,
	) {}

	/**
	 * Charge bytes to the budget.
	 *
	 * @returns An ArchiveSizeError once the limit is exceeded, otherwise undefined
	 */
	consume(bytes: number): ArchiveSizeError | undefined {
		this.used += bytes;
		if (this.used > this.maxSize) {
			return new ArchiveSizeError(
				`${this.label} exceeds maximum size: ${formatSize(this.used)} > ${formatSize(this.maxSize)}`,
				this.maxSize,
			);
		}
		return undefined;
	}

	get total(): number {
		return this.used;
	}
}

/**
 * Format a byte count for display.
 *
 * @param bytes - Number of bytes
 * @returns Human-readable size string
 */
export function formatSize(bytes: number): string {
	if (bytes < 1024) {
		return `${bytes} B`;
	}
	if (bytes < 1024 * 1024) {
		return `${(bytes / 1024).toFixed(1)} KB`;
	}
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
