import { validateChecksum } from "./checksum";
import { BLOCK_SIZE, BLOCK_SIZE_MASK, TYPEFLAG, USTAR } from "./constants";
import { err, ok, type Result } from "./errors";
import { decodeUtf8, trimSlashes } from "./path";
import type { TarEntry, TarEntryInfo, TarEntryKind, TarVisitor } from "./types";
import { isZeroBlock, readField, readOctal, readString } from "./utils";

// Called for each header with the offset its content starts at. Return false
// to stop the walk.
type HeaderCallback = (info: TarEntryInfo, dataOffset: number) => boolean;

function kindOf(typeflag: string): TarEntryKind {
	switch (typeflag) {
		case "":
		case TYPEFLAG.file:
			return "file";
		case TYPEFLAG.directory:
			return "directory";
		case TYPEFLAG.symlink:
			return "symlink";
		case TYPEFLAG.hardlink:
			return "hardlink";
		default:
			return "other";
	}
}

// Links and directories have no content blocks, whatever their size field says.
function hasContent(kind: TarEntryKind): boolean {
	return kind === "file" || kind === "other";
}

/**
 * Parses the header block at `offset`, which the caller has already checked
 * is complete and non-zero.
 */
function parseHeader(bytes: Uint8Array, offset: number): Result<TarEntryInfo> {
	const block = bytes.subarray(offset, offset + BLOCK_SIZE);

	if (!validateChecksum(block)) {
		return err("TAR_BAD_CHECKSUM", `Invalid checksum at offset ${offset}`, {
			offset,
		});
	}

	const ustar =
		readString(block, USTAR.magic.offset, USTAR.magic.size) === "ustar";

	const name = decodeUtf8(readField(block, USTAR.name.offset, USTAR.name.size));
	const prefix = ustar
		? decodeUtf8(readField(block, USTAR.prefix.offset, USTAR.prefix.size))
		: ok("");

	if (!name.ok || !prefix.ok) {
		return err(
			"PATH_NOT_NORMALIZABLE",
			`Entry name at offset ${offset} is not valid UTF-8`,
			{ offset },
		);
	}

	const typeflag = readString(
		block,
		USTAR.typeflag.offset,
		USTAR.typeflag.size,
	);
	const kind = kindOf(typeflag);

	return ok({
		path: prefix.value ? `${prefix.value}/${name.value}` : name.value,
		kind,
		typeflag,
		mode: readOctal(block, USTAR.mode.offset, USTAR.mode.size),
		uid: readOctal(block, USTAR.uid.offset, USTAR.uid.size),
		gid: readOctal(block, USTAR.gid.offset, USTAR.gid.size),
		size: readOctal(block, USTAR.size.offset, USTAR.size.size),
		mtime: readOctal(block, USTAR.mtime.offset, USTAR.mtime.size),
		linkTarget:
			kind === "symlink" || kind === "hardlink"
				? readString(block, USTAR.linkname.offset, USTAR.linkname.size)
				: "",
		ustar,
		offset,
	});
}

/**
 * Walks the archive header by header. Resolves to `true` when the end of the
 * archive was reached and `false` when the callback stopped the walk.
 */
function walk(bytes: Uint8Array, onHeader: HeaderCallback): Result<boolean> {
	let offset = 0;
	let zeroBlocks = 0;

	while (offset < bytes.length) {
		if (offset + BLOCK_SIZE > bytes.length) {
			return err("TAR_TRUNCATED", `Incomplete header at offset ${offset}`, {
				offset,
			});
		}

		if (isZeroBlock(bytes, offset, BLOCK_SIZE)) {
			offset += BLOCK_SIZE;
			// Two consecutive zero blocks mark the end of the archive.
			if (++zeroBlocks >= 2) break;
			continue;
		}
		zeroBlocks = 0;

		const header = parseHeader(bytes, offset);
		if (!header.ok) return header;

		const info = header.value;
		const dataOffset = offset + BLOCK_SIZE;
		const size = hasContent(info.kind) ? info.size : 0;

		if (dataOffset + size > bytes.length) {
			return err("TAR_TRUNCATED", `Incomplete file data for ${info.path}`, {
				entryName: info.path,
				offset,
			});
		}

		if (!onHeader(info, dataOffset)) return ok(false);

		// Skip the content and its padding up to the next block boundary.
		offset = dataOffset + size + (-size & BLOCK_SIZE_MASK);
	}

	return ok(true);
}

function withData(
	bytes: Uint8Array,
	info: TarEntryInfo,
	dataOffset: number,
): TarEntry {
	const size = hasContent(info.kind) ? info.size : 0;
	return { ...info, data: bytes.slice(dataOffset, dataOffset + size) };
}

/**
 * Decodes a complete tar archive held in memory.
 *
 * Every header checksum is verified. Symlinks, hardlinks and other special
 * entries are returned as they are so callers can decide what to do with
 * them.
 *
 * @example
 * ```typescript
 * import { readTar } from 'lgx';
 *
 * const result = readTar(tarBytes);
 * if (result.ok) {
 *   for (const entry of result.value) console.log(entry.path, entry.size);
 * }
 * ```
 */
export function readTar(bytes: Uint8Array): Result<TarEntry[]> {
	const entries: TarEntry[] = [];

	const result = walk(bytes, (info, dataOffset) => {
		entries.push(withData(bytes, info, dataOffset));
		return true;
	});

	return result.ok ? ok(entries) : result;
}

/**
 * Lists header metadata without copying any content. Stops quietly at the
 * first block that cannot be read and returns what came before it.
 */
export function readTarInfo(bytes: Uint8Array): TarEntryInfo[] {
	const infos: TarEntryInfo[] = [];

	walk(bytes, (info) => {
		infos.push(info);
		return true;
	});

	return infos;
}

/**
 * Returns the content of the regular file at `path`. Leading and trailing
 * slashes are ignored on both the query and the stored paths.
 */
export function readTarFile(
	bytes: Uint8Array,
	path: string,
): Result<Uint8Array> {
	const wanted = trimSlashes(path);
	const matches: Uint8Array[] = [];

	const result = walk(bytes, (info, dataOffset) => {
		if (info.kind !== "file" || trimSlashes(info.path) !== wanted) return true;
		matches.push(bytes.slice(dataOffset, dataOffset + info.size));
		return false;
	});

	if (!result.ok) return result;
	if (matches.length === 0) {
		return err("TAR_ENTRY_NOT_FOUND", `File not found: ${path}`, {
			entryName: path,
		});
	}
	return ok(matches[0]);
}

/**
 * Calls `visitor` for each entry in archive order. Resolves to `true` if the
 * walk reached the end of the archive, `false` if the visitor stopped it.
 */
export function iterateTar(
	bytes: Uint8Array,
	visitor: TarVisitor,
): Result<boolean> {
	return walk(bytes, (info, dataOffset) =>
		visitor(withData(bytes, info, dataOffset)),
	);
}

/**
 * Returns true if the buffer starts with a complete header block whose
 * checksum verifies. The USTAR magic is not required.
 */
export function isValidTar(bytes: Uint8Array): boolean {
	return (
		bytes.length >= BLOCK_SIZE &&
		validateChecksum(bytes.subarray(0, BLOCK_SIZE))
	);
}
