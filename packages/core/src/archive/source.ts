/**
 * Normalisation of archive byte sources.
 */

import { Readable } from "node:stream";
import { ArchiveSizeError, CancellationError, getErrorMessage, TransportError } from "../errors.js";
import type { ArchiveSource } from "./types.js";
import type { SizeBudget } from "./limits.js";

/**
 * Present any supported source as a Node readable stream.
 */
export function toReadable(source: ArchiveSource): Readable {
	if (source instanceof Readable) {
		return source;
	}
	if (source instanceof Uint8Array) {
		return Readable.from([Buffer.from(source.buffer, source.byteOffset, source.byteLength)], { objectMode: false });
	}
	return Readable.fromWeb(source);
}

/**
 * Chunks from caller-supplied streams may be strings or plain Uint8Arrays.
 */
export function toBuffer(chunk: Buffer | Uint8Array | string): Buffer {
	if (Buffer.isBuffer(chunk)) {
		return chunk;
	}
	return typeof chunk === "string" ? Buffer.from(chunk) : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
}

/**
 * Read a stream to its end into one buffer.
 *
 * @param input - Stream to drain
 * @param budget - Budget charged for every chunk
 * @param signal - Aborting destroys the stream
 * @returns Concatenated bytes
 * @throws TransportError if the stream fails
 * @throws ArchiveSizeError if the budget is exceeded
 * @throws CancellationError if the signal aborts
 */
export async function readAll(input: Readable, budget: SizeBudget, signal?: AbortSignal): Promise<Buffer> {
	const chunks: Buffer[] = [];

	if (signal?.aborted) {
		input.destroy();
		throw new CancellationError();
	}
	const onAbort = () => input.destroy(new CancellationError());
	signal?.addEventListener("abort", onAbort, { once: true });

	try {
		for await (const chunk of input) {
			const buffer = toBuffer(chunk);
			const exceeded = budget.consume(buffer.length);
			if (exceeded) {
				input.destroy();
				throw exceeded;
			}
			chunks.push(buffer);
		}
	} catch (error) {
		if (error instanceof ArchiveSizeError || error instanceof CancellationError) {
			throw error;
		}
		throw new TransportError(`Failed to read archive stream: ${getErrorMessage(error)}`, { cause: error });
	} finally {
		signal?.removeEventListener("abort", onAbort);
	}

	return Buffer.concat(chunks);
}
