/**
 * In-memory archive builders for tests.
 */

import { deflateRawSync } from "node:zlib";
import * as tar from "tar";

export interface PackEntrySpec {
	path: string;
	content?: string;
	type?: "File" | "Directory" | "SymbolicLink";
	mode?: number;
	/** Seconds since the epoch. */
	mtime?: number;
	linkpath?: string;
}

/**
 * Pack a well-formed tar archive with node-tar, entirely in memory.
 */
export function packTar(entries: PackEntrySpec[]): Promise<Buffer> {
	const pack = new tar.Pack();
	const chunks: Buffer[] = [];

	const done = new Promise<Buffer>((resolve, reject) => {
		pack.on("data", (chunk: Buffer) => {
			chunks.push(chunk);
		});
		pack.on("end", () => resolve(Buffer.concat(chunks)));
		pack.on("error", reject);
	});

	for (const spec of entries) {
		const type = spec.type ?? "File";
		const data = Buffer.from(spec.content ?? "", "utf8");
		const header = new tar.Header({
			path: spec.path,
			type,
			mode: spec.mode ?? (type === "Directory" ? 0o755 : 0o644),
			size: data.length,
			mtime: new Date((spec.mtime ?? 1700000000) * 1000),
			linkpath: spec.linkpath,
		});
		const entry = new tar.ReadEntry(header);
		pack.add(entry);
		if (data.length > 0) {
			entry.end(data);
		} else {
			entry.end();
		}
	}

	pack.end();
	return done;
}

export interface TarEntrySpec {
	name: string;
	content?: string;
	/** "0" file, "5" directory, "2" symlink, "g" pax global header, "x" pax header. */
	typeflag?: "0" | "2" | "5" | "g" | "x";
	mode?: number;
	mtime?: number;
	linkname?: string;
}

function writeString(block: Buffer, offset: number, length: number, value: string): void {
	block.write(value.slice(0, length), offset, length, "utf8");
}

function writeOctal(block: Buffer, offset: number, length: number, value: number): void {
	block.write(`${value.toString(8).padStart(length - 1, "0")}\0`, offset, length, "ascii");
}

function tarHeader(spec: TarEntrySpec, size: number): Buffer {
	const block = Buffer.alloc(512);
	const typeflag = spec.typeflag ?? "0";

	writeString(block, 0, 100, spec.name);
	writeOctal(block, 100, 8, spec.mode ?? (typeflag === "5" ? 0o755 : 0o644));
	writeOctal(block, 108, 8, 0);
	writeOctal(block, 116, 8, 0);
	writeOctal(block, 124, 12, size);
	writeOctal(block, 136, 12, spec.mtime ?? 1700000000);
	block.fill(0x20, 148, 156);
	block.write(typeflag, 156, 1, "ascii");
	writeString(block, 157, 100, spec.linkname ?? "");
	block.write("ustar\0", 257, 6, "binary");
	block.write("00", 263, 2, "ascii");

	let checksum = 0;
	for (const byte of block) {
		checksum += byte;
	}
	block.write(`${checksum.toString(8).padStart(6, "0")}\0 `, 148, 8, "ascii");

	return block;
}

/**
 * Build one pax record: "<length> <key>=<value>\n", where length counts itself.
 */
export function paxRecord(key: string, value: string): string {
	const body = ` ${key}=${value}\n`;
	let length = body.length + 1;
	while (`${length}${body}`.length !== length) {
		length++;
	}
	return `${length}${body}`;
}

/**
 * Write ustar blocks byte by byte, for records node-tar does not pack on
 * request (pax global and per-entry headers) and for corrupt input.
 */
export function craftTar(entries: TarEntrySpec[]): Buffer {
	const blocks: Buffer[] = [];

	for (const entry of entries) {
		const content = Buffer.from(entry.content ?? "", "utf8");
		blocks.push(tarHeader(entry, content.length));
		if (content.length > 0) {
			const padded = Buffer.alloc(Math.ceil(content.length / 512) * 512);
			content.copy(padded);
			blocks.push(padded);
		}
	}

	blocks.push(Buffer.alloc(1024));
	return Buffer.concat(blocks);
}

export interface ZipEntrySpec {
	name: string;
	content?: string;
	/** Unix mode stored in the external attributes. */
	mode?: number;
	/** Compress with deflate instead of storing. */
	deflate?: boolean;
}

const CRC_TABLE = (() => {
	const table = new Uint32Array(256);
	for (let n = 0; n < 256; n++) {
		let c = n;
		for (let k = 0; k < 8; k++) {
			c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
		}
		table[n] = c >>> 0;
	}
	return table;
})();

function crc32(data: Buffer): number {
	let crc = 0xffffffff;
	for (const byte of data) {
		crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
	}
	return (crc ^ 0xffffffff) >>> 0;
}

// 2024-01-02 03:04:06 in DOS format.
const DOS_TIME = (3 << 11) | (4 << 5) | 3;
const DOS_DATE = ((2024 - 1980) << 9) | (1 << 5) | 2;

/**
 * Build a zip archive with stored or deflated entries, in the given order.
 */
export function buildZip(entries: ZipEntrySpec[]): Buffer {
	const locals: Buffer[] = [];
	const centrals: Buffer[] = [];
	let offset = 0;

	for (const entry of entries) {
		const name = Buffer.from(entry.name, "utf8");
		const raw = Buffer.from(entry.content ?? "", "utf8");
		const method = entry.deflate ? 8 : 0;
		const stored = entry.deflate ? deflateRawSync(raw) : raw;
		const crc = crc32(raw);
		const isDirectory = entry.name.endsWith("/");
		const mode = entry.mode ?? (isDirectory ? 0o40755 : 0o100644);

		const local = Buffer.alloc(30);
		local.writeUInt32LE(0x04034b50, 0);
		local.writeUInt16LE(20, 4);
		local.writeUInt16LE(0, 6);
		local.writeUInt16LE(method, 8);
		local.writeUInt16LE(DOS_TIME, 10);
		local.writeUInt16LE(DOS_DATE, 12);
		local.writeUInt32LE(crc, 14);
		local.writeUInt32LE(stored.length, 18);
		local.writeUInt32LE(raw.length, 22);
		local.writeUInt16LE(name.length, 26);
		local.writeUInt16LE(0, 28);
		locals.push(local, name, stored);

		const central = Buffer.alloc(46);
		central.writeUInt32LE(0x02014b50, 0);
		central.writeUInt16LE((3 << 8) | 20, 4);
		central.writeUInt16LE(20, 6);
		central.writeUInt16LE(0, 8);
		central.writeUInt16LE(method, 10);
		central.writeUInt16LE(DOS_TIME, 12);
		central.writeUInt16LE(DOS_DATE, 14);
		central.writeUInt32LE(crc, 16);
		central.writeUInt32LE(stored.length, 20);
		central.writeUInt32LE(raw.length, 24);
		central.writeUInt16LE(name.length, 28);
		central.writeUInt16LE(0, 30);
		central.writeUInt16LE(0, 32);
		central.writeUInt16LE(0, 34);
		central.writeUInt16LE(0, 36);
		central.writeUInt32LE((mode << 16) >>> 0, 38);
		central.writeUInt32LE(offset, 42);
		centrals.push(central, name);

		offset += local.length + name.length + stored.length;
	}

	const centralDirectory = Buffer.concat(centrals);
	const end = Buffer.alloc(22);
	end.writeUInt32LE(0x06054b50, 0);
	end.writeUInt16LE(0, 4);
	end.writeUInt16LE(0, 6);
	end.writeUInt16LE(entries.length, 8);
	end.writeUInt16LE(entries.length, 10);
	end.writeUInt32LE(centralDirectory.length, 12);
	end.writeUInt32LE(offset, 16);
	end.writeUInt16LE(0, 20);

	return Buffer.concat([...locals, centralDirectory, end]);
}

/**
 * Map extraction results to path -> UTF-8 content for assertions.
 */
export function contents(files: Map<string, { data: Buffer }>): Record<string, string> {
	const result: Record<string, string> = {};
	for (const [path, file] of files) {
		result[path] = file.data.toString("utf8");
	}
	return result;
}
