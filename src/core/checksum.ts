import { BLOCK_SIZE, USTAR } from "./constants";
import { encoder, readOctal } from "./utils";

// ASCII code for a space character.
const CHECKSUM_SPACE = 32;

/**
 * Sums the header bytes with the checksum field itself counted as eight
 * ASCII spaces.
 */
export function calculateChecksum(block: Uint8Array): number {
	const checksumEnd = USTAR.checksum.offset + USTAR.checksum.size;
	let sum = CHECKSUM_SPACE * USTAR.checksum.size;

	for (let i = 0; i < USTAR.checksum.offset; i++) {
		sum += block[i];
	}

	for (let i = checksumEnd; i < BLOCK_SIZE; i++) {
		sum += block[i];
	}

	return sum;
}

/**
 * Validates the checksum of a tar header block.
 */
export function validateChecksum(block: Uint8Array): boolean {
	const storedChecksum = readOctal(
		block,
		USTAR.checksum.offset,
		USTAR.checksum.size,
	);

	return storedChecksum === calculateChecksum(block);
}

/**
 * Calculates and writes the checksum to a tar header block.
 */
export function writeChecksum(block: Uint8Array): void {
	const checksum = calculateChecksum(block);

	// Format as a 6-digit octal string, NUL-terminated, and space-padded.
	const checksumString = `${checksum.toString(8).padStart(6, "0")}\0 `;
	block.set(encoder.encode(checksumString), USTAR.checksum.offset);
}
