/** Kind of entry a package may store. */
export type EntryKind = "file" | "directory";

/**
 * One unit inside an archive.
 *
 * Paths are NFC, forward-slash separated and relative. Directories carry no
 * data.
 */
export interface ArchiveEntry {
	path: string;
	kind: EntryKind;
	data: Uint8Array;
}

/**
 * Entry kinds a decoded archive can contain. Anything other than `file` and
 * `directory` is kept by the decoder so verification can report it, but is
 * never written by the encoder.
 */
export type TarEntryKind = EntryKind | "symlink" | "hardlink" | "other";

/** Header metadata for one decoded entry. */
export interface TarEntryInfo {
	/** Full path, with the USTAR prefix joined back on. */
	path: string;
	kind: TarEntryKind;
	/** Raw type flag character (`"0"`, `"5"`, ...; `""` for a NUL flag). */
	typeflag: string;
	mode: number;
	uid: number;
	gid: number;
	size: number;
	/** Seconds since the epoch. */
	mtime: number;
	/** Target of a symlink or hardlink, empty otherwise. */
	linkTarget: string;
	/** True if the header carries the USTAR magic. */
	ustar: boolean;
	/** Byte offset of the header block within the archive. */
	offset: number;
}

/** A decoded entry with its content. */
export interface TarEntry extends TarEntryInfo {
	data: Uint8Array;
}

/** Return `false` to stop a traversal early. */
export type TarVisitor = (entry: TarEntry) => boolean;
