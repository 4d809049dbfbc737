import { writeChecksum } from "./checksum";
import {
	BLOCK_SIZE,
	BLOCK_SIZE_MASK,
	DEFAULT_DIR_MODE,
	DEFAULT_FILE_MODE,
	TYPEFLAG,
	USTAR,
	USTAR_MAGIC,
	USTAR_VERSION,
} from "./constants";
import { LgxError } from "./errors";
import { trimSlashes } from "./path";
import type { ArchiveEntry, EntryKind } from "./types";
import {
	compareBytes,
	concatBytes,
	decoder,
	encoder,
	writeBytes,
	writeOctal,
	writeString,
} from "./utils";

const SLASH = 0x2f;
const EMPTY: Uint8Array = new Uint8Array(0);
const EOF_BLOCKS = new Uint8Array(BLOCK_SIZE * 2);

/**
 * Collects entries and turns them into a canonical USTAR byte stream.
 *
 * The output of {@link TarEncoder.finalize} depends only on the set of
 * (path, kind, bytes) triples added: entries are sorted, and every header
 * carries fixed ownership, permissions and timestamps.
 */
export interface TarEncoder {
	/** Add a regular file. Strings are encoded as UTF-8. */
	addFile(path: string, data: Uint8Array | string): void;

	/** Add a directory. A trailing slash is optional. */
	addDirectory(path: string): void;

	/** Add a prepared entry. */
	addEntry(entry: ArchiveEntry): void;

	/** Drop every entry added so far. */
	clear(): void;

	/** Number of entries added so far. */
	entryCount(): number;

	/**
	 * Build the archive: entries in ascending byte order of their tar path,
	 * each as a header block followed by zero-padded content, then two zero
	 * blocks.
	 *
	 * @throws {LgxError} `TAR_PATH_TOO_LONG` when a path cannot be split into
	 * USTAR prefix and name, `TAR_DUPLICATE_ENTRY` when two different entries
	 * share a path.
	 */
	finalize(): Uint8Array;
}

/**
 * Create a deterministic tar encoder.
 *
 * @example
 * ```typescript
 * import { createTarEncoder } from 'lgx';
 *
 * const tar = createTarEncoder();
 * tar.addDirectory("variants");
 * tar.addFile("variants/web/index.js", "console.log('hi');");
 * const bytes = tar.finalize();
 * ```
 */
export function createTarEncoder(): TarEncoder {
	let entries: ArchiveEntry[] = [];

	return {
		addFile(path, data) {
			entries.push({
				path,
				kind: "file",
				data: typeof data === "string" ? encoder.encode(data) : data,
			});
		},

		addDirectory(path) {
			entries.push({ path, kind: "directory", data: EMPTY });
		},

		addEntry(entry) {
			entries.push({
				path: entry.path,
				kind: entry.kind,
				data: entry.kind === "directory" ? EMPTY : entry.data,
			});
		},

		clear() {
			entries = [];
		},

		entryCount() {
			return entries.length;
		},

		finalize() {
			const prepared = dedupe(entries).map((entry) => ({
				entry,
				key: encoder.encode(toTarPath(entry.path, entry.kind)),
			}));
			prepared.sort((a, b) => compareBytes(a.key, b.key));

			const chunks: Uint8Array[] = [];
			for (const { entry, key } of prepared) {
				const size = entry.kind === "file" ? entry.data.length : 0;
				chunks.push(createTarHeader({ path: key, kind: entry.kind, size }));

				if (size > 0) {
					chunks.push(entry.data);

					// Pad the entry data to fill a complete 512-byte block.
					const paddingSize = -size & BLOCK_SIZE_MASK;
					if (paddingSize > 0) chunks.push(new Uint8Array(paddingSize));
				}
			}

			// A valid tar archive ends with two 512-byte empty blocks.
			chunks.push(EOF_BLOCKS);
			return concatBytes(chunks);
		},
	};
}

/**
 * Path as written to a header: no leading or trailing slashes, except the one
 * trailing slash that marks a directory.
 */
export function toTarPath(path: string, kind: EntryKind): string {
	const trimmed = trimSlashes(path);
	return kind === "directory" && trimmed.length > 0 ? `${trimmed}/` : trimmed;
}

// Identical duplicates collapse into one entry; differing ones are an error.
function dedupe(entries: ArchiveEntry[]): ArchiveEntry[] {
	const byPath = new Map<string, ArchiveEntry>();

	for (const entry of entries) {
		const key = trimSlashes(entry.path);
		const existing = byPath.get(key);

		if (existing === undefined) {
			byPath.set(key, entry);
			continue;
		}

		const identical =
			existing.kind === entry.kind &&
			(entry.kind === "directory" ||
				compareBytes(existing.data, entry.data) === 0);

		if (!identical) {
			throw new LgxError(
				"TAR_DUPLICATE_ENTRY",
				`Conflicting entries for archive path "${key}".`,
				{ entryName: key },
			);
		}
	}

	return [...byPath.values()];
}

/**
 * Attempts to split a long UTF-8 path into a USTAR-compatible name and prefix.
 * Splits only at a `/`, and never at a trailing one, so the name part is not
 * empty. Returns `null` if no split point satisfies both field limits.
 */
export function findUstarSplit(
	path: Uint8Array,
): { name: Uint8Array; prefix: Uint8Array } | null {
	// For the name part to fit, the slash must be at or after this index.
	const minSlashIndex = path.length - USTAR.name.size - 1;

	// Rightmost slash that respects the prefix length limit (155).
	const slashIndex = path.lastIndexOf(
		SLASH,
		Math.min(USTAR.prefix.size, path.length - 2),
	);

	if (slashIndex > 0 && slashIndex >= minSlashIndex) {
		return {
			prefix: path.subarray(0, slashIndex),
			name: path.subarray(slashIndex + 1),
		};
	}

	return null;
}

/**
 * Creates a 512-byte USTAR header block for an entry whose path is already in
 * tar form (see {@link toTarPath}).
 *
 * @throws {LgxError} `TAR_PATH_TOO_LONG` if the path needs a split and none is
 * possible, `PATH_INVALID` if it is empty.
 */
export function createTarHeader(header: {
	path: string | Uint8Array;
	kind: EntryKind;
	size: number;
}): Uint8Array {
	const view = new Uint8Array(BLOCK_SIZE);
	const pathBytes =
		typeof header.path === "string" ? encoder.encode(header.path) : header.path;
	const isDirectory = header.kind === "directory";

	if (pathBytes.length === 0) {
		throw new LgxError("PATH_INVALID", "Archive entry path is empty.");
	}

	let name: Uint8Array = pathBytes;
	let prefix: Uint8Array = EMPTY;

	// If a path is >100 bytes, USTAR allows splitting it into a 155-byte
	// prefix and a 100-byte name.
	if (pathBytes.length > USTAR.name.size) {
		const split = findUstarSplit(pathBytes);
		if (split === null) {
			const path = decoder.decode(pathBytes);
			throw new LgxError(
				"TAR_PATH_TOO_LONG",
				`Path too long for USTAR format: ${path}`,
				{ entryName: path },
			);
		}
		name = split.name;
		prefix = split.prefix;
	}

	writeBytes(view, USTAR.name.offset, USTAR.name.size, name);
	writeOctal(
		view,
		USTAR.mode.offset,
		USTAR.mode.size,
		isDirectory ? DEFAULT_DIR_MODE : DEFAULT_FILE_MODE,
	);
	writeOctal(view, USTAR.uid.offset, USTAR.uid.size, 0);
	writeOctal(view, USTAR.gid.offset, USTAR.gid.size, 0);
	writeOctal(
		view,
		USTAR.size.offset,
		USTAR.size.size,
		isDirectory ? 0 : header.size,
	);
	writeOctal(view, USTAR.mtime.offset, USTAR.mtime.size, 0);
	writeString(
		view,
		USTAR.typeflag.offset,
		USTAR.typeflag.size,
		isDirectory ? TYPEFLAG.directory : TYPEFLAG.file,
	);

	writeString(view, USTAR.magic.offset, USTAR.magic.size, USTAR_MAGIC);
	writeString(view, USTAR.version.offset, USTAR.version.size, USTAR_VERSION);
	// uname and gname stay empty.
	writeOctal(view, USTAR.devmajor.offset, USTAR.devmajor.size, 0);
	writeOctal(view, USTAR.devminor.offset, USTAR.devminor.size, 0);
	writeBytes(view, USTAR.prefix.offset, USTAR.prefix.size, prefix);

	writeChecksum(view);

	return view;
}
