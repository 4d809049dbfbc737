import { constants, deflateRawSync, gunzipSync } from "node:zlib";
import { GZIP } from "./constants";
import { crc32 } from "./crc32";
import { err, ok, type Result } from "./errors";
import { concatBytes } from "./utils";

// Fixed deflate parameters. Changing any of them changes the archive bytes.
const DEFLATE_OPTIONS = {
	level: 6,
	windowBits: 15,
	memLevel: 8,
	strategy: constants.Z_DEFAULT_STRATEGY,
} as const;

/**
 * The 10-byte member header: no flags, zero mtime, no extra flags, OS
 * "unknown".
 */
function createGzipHeader(): Uint8Array {
	return Uint8Array.of(
		GZIP.magic1,
		GZIP.magic2,
		GZIP.methodDeflate,
		GZIP.flagsNone,
		0,
		0,
		0,
		0,
		GZIP.extraFlagsNone,
		GZIP.osUnknown,
	);
}

function createGzipTrailer(data: Uint8Array): Uint8Array {
	const trailer = new Uint8Array(GZIP.trailerSize);
	const view = new DataView(trailer.buffer);
	view.setUint32(0, crc32(data), true);
	// ISIZE is the input length modulo 2^32.
	view.setUint32(4, data.length >>> 0, true);
	return trailer;
}

/**
 * Compresses `data` into a single gzip member whose bytes depend only on the
 * input.
 *
 * @example
 * ```typescript
 * import { compress, createTarEncoder } from 'lgx';
 *
 * const tar = createTarEncoder();
 * tar.addFile("manifest.json", "{}");
 * const archive = compress(tar.finalize());
 * ```
 */
export function compress(data: Uint8Array): Uint8Array {
	const deflated = deflateRawSync(data, DEFLATE_OPTIONS);
	return concatBytes([
		createGzipHeader(),
		new Uint8Array(deflated.buffer, deflated.byteOffset, deflated.byteLength),
		createGzipTrailer(data),
	]);
}

/**
 * Inflates a gzip stream. Truncated or corrupt input is an error; partial
 * output is never returned.
 */
export function decompress(data: Uint8Array): Result<Uint8Array> {
	if (!isGzip(data)) {
		return err("GZIP_BAD_MAGIC", "Not valid gzip data");
	}

	try {
		const inflated = gunzipSync(data);
		return ok(
			new Uint8Array(inflated.buffer, inflated.byteOffset, inflated.byteLength),
		);
	} catch (cause) {
		const detail = cause instanceof Error ? cause.message : String(cause);
		return err("GZIP_CORRUPT", `Gzip decompression failed: ${detail}`, {
			cause,
		});
	}
}

/** Returns true if the buffer starts with the gzip magic bytes. */
export function isGzip(data: Uint8Array): boolean {
	return (
		data.length >= 2 && data[0] === GZIP.magic1 && data[1] === GZIP.magic2
	);
}

/**
 * Creates a gzip decompression stream that is compatible with Uint8Array
 * streams.
 *
 * @example
 * ```typescript
 * import { createReadStream } from 'node:fs';
 * import { Readable } from 'node:stream';
 * import { createGzipDecoder } from 'lgx';
 *
 * const tarBytes = Readable.toWeb(createReadStream("pkg.lgx"))
 *   .pipeThrough(createGzipDecoder());
 * ```
 */
export function createGzipDecoder(): ReadableWritablePair<
	Uint8Array,
	Uint8Array
> {
	// DecompressionStream is typed over `BufferSource`, while `pipeThrough`
	// needs a pair typed over `Uint8Array` only.
	return new DecompressionStream("gzip") as unknown as ReadableWritablePair<
		Uint8Array,
		Uint8Array
	>;
}
