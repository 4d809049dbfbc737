export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

/** Decoder that rejects malformed UTF-8 instead of substituting U+FFFD. */
export const strictDecoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Writes raw bytes into the view, which is assumed to be zero-filled, so any
 * remaining space is NUL-padded.
 */
export function writeBytes(
	view: Uint8Array,
	offset: number,
	size: number,
	value: Uint8Array,
) {
	view.set(value.subarray(0, size), offset);
}

/**
 * Writes a string to the view. Callers check lengths beforehand; anything
 * longer than `size` bytes is cut off.
 */
export function writeString(
	view: Uint8Array,
	offset: number,
	size: number,
	value?: string,
) {
	if (value) {
		encoder.encodeInto(value, view.subarray(offset, offset + size));
	}
}

/**
 * Writes a number as a zero-padded octal string.
 */
export function writeOctal(
	view: Uint8Array,
	offset: number,
	size: number,
	value: number,
) {
	// Pad with leading zeros to size - 1. The final byte is left as 0 (NUL
	// terminator), assuming a zero-filled view.
	const octalString = value.toString(8).padStart(size - 1, "0");
	encoder.encodeInto(octalString, view.subarray(offset, offset + size - 1));
}

/**
 * Returns the bytes of a NUL-terminated field.
 */
export function readField(
	view: Uint8Array,
	offset: number,
	size: number,
): Uint8Array {
	const end = view.indexOf(0, offset);
	const sliceEnd = end === -1 || end > offset + size ? offset + size : end;
	return view.subarray(offset, sliceEnd);
}

/**
 * Reads a NUL-terminated string from the view.
 */
export function readString(
	view: Uint8Array,
	offset: number,
	size: number,
): string {
	return decoder.decode(readField(view, offset, size));
}

/**
 * Reads an octal number from the view. Leading spaces and NULs are skipped
 * and parsing stops at the first non-octal byte.
 */
export function readOctal(
	view: Uint8Array,
	offset: number,
	size: number,
): number {
	const end = offset + size;
	let i = offset;

	while (i < end && (view[i] === 32 || view[i] === 0)) i++;

	let value = 0;
	for (; i < end; i++) {
		const charCode = view[i];
		if (charCode < 48 || charCode > 55) break; // '0'..'7'
		value = value * 8 + (charCode - 48);
	}

	return value;
}

/** Returns true if every byte of the range is zero. */
export function isZeroBlock(view: Uint8Array, offset: number, size: number) {
	for (let i = offset; i < offset + size; i++) {
		if (view[i] !== 0) return false;
	}
	return true;
}

/** Concatenates chunks into a single buffer. */
export function concatBytes(chunks: Uint8Array[]): Uint8Array {
	let totalLength = 0;
	for (const chunk of chunks) totalLength += chunk.length;

	const result = new Uint8Array(totalLength);
	let offset = 0;

	for (const chunk of chunks) {
		result.set(chunk, offset);
		offset += chunk.length;
	}

	return result;
}

/**
 * Reads an entire ReadableStream of Uint8Arrays into a single, combined Uint8Array.
 */
export async function streamToBuffer(
	stream: ReadableStream<Uint8Array>,
): Promise<Uint8Array> {
	const chunks: Uint8Array[] = [];
	const reader = stream.getReader();

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;
			chunks.push(value);
		}
		return concatBytes(chunks);
	} finally {
		reader.releaseLock();
	}
}

/** Byte-wise comparison of two buffers, usable as a sort comparator. */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
	const length = Math.min(a.length, b.length);
	for (let i = 0; i < length; i++) {
		if (a[i] !== b[i]) return a[i] - b[i];
	}
	return a.length - b.length;
}
