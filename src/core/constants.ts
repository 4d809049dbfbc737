/** Size of a TAR block in bytes. */
export const BLOCK_SIZE = 512;

/** Mask for rounding sizes to a block boundary. */
export const BLOCK_SIZE_MASK = BLOCK_SIZE - 1;

/** Permissions for regular files (rw-r--r--). */
export const DEFAULT_FILE_MODE = 0o644;

/** Permissions for directories (rwxr-xr-x). */
export const DEFAULT_DIR_MODE = 0o755;

/** Offsets and sizes of fields in a USTAR header block.
 *
 * @see https://www.gnu.org/software/tar/manual/html_node/Standard.html
 */
export const USTAR = {
	name: { offset: 0, size: 100 },
	mode: { offset: 100, size: 8 },
	uid: { offset: 108, size: 8 },
	gid: { offset: 116, size: 8 },
	size: { offset: 124, size: 12 },
	mtime: { offset: 136, size: 12 },
	checksum: { offset: 148, size: 8 },
	typeflag: { offset: 156, size: 1 },
	linkname: { offset: 157, size: 100 },
	magic: { offset: 257, size: 6 },
	version: { offset: 263, size: 2 },
	uname: { offset: 265, size: 32 },
	gname: { offset: 297, size: 32 },
	devmajor: { offset: 329, size: 8 },
	devminor: { offset: 337, size: 8 },
	prefix: { offset: 345, size: 155 },
} as const;

/** USTAR magic ("ustar" followed by NUL). */
export const USTAR_MAGIC = "ustar\0";

/** USTAR version ("00"). */
export const USTAR_VERSION = "00";

/** Type flag constants for the entry kinds the format distinguishes. */
export const TYPEFLAG = {
	file: "0",
	hardlink: "1",
	symlink: "2",
	directory: "5",
} as const;

/** gzip member header bytes (RFC 1952). */
export const GZIP = {
	magic1: 0x1f,
	magic2: 0x8b,
	methodDeflate: 0x08,
	flagsNone: 0x00,
	extraFlagsNone: 0x00,
	/** "Unknown" operating system, so output does not vary by host. */
	osUnknown: 0xff,
	headerSize: 10,
	trailerSize: 8,
} as const;

/** Names allowed as the first path segment of an archive entry. */
export const ALLOWED_ROOT_ENTRIES: ReadonlySet<string> = new Set([
	"manifest.json",
	"manifest.cose",
	"variants",
	"docs",
	"licenses",
]);

export const MANIFEST_FILE = "manifest.json";
export const SIGNATURE_FILE = "manifest.cose";
export const VARIANTS_DIR = "variants";

/** File extension of package archives. */
export const PACKAGE_EXTENSION = ".lgx";
