export { calculateChecksum, validateChecksum } from "./checksum";
export {
	compress,
	createGzipDecoder,
	decompress,
	isGzip,
} from "./compression";
export {
	ALLOWED_ROOT_ENTRIES,
	MANIFEST_FILE,
	PACKAGE_EXTENSION,
	SIGNATURE_FILE,
	VARIANTS_DIR,
} from "./constants";
export { Crc32, crc32 } from "./crc32";
export {
	err,
	LgxError,
	type LgxErrorCode,
	type LgxErrorKind,
	ok,
	type Result,
	toLgxError,
	type ValidationResult,
} from "./errors";
export {
	CURRENT_MANIFEST_VERSION,
	INITIAL_PACKAGE_VERSION,
	Manifest,
	type ManifestData,
} from "./manifest";
export {
	createTarEncoder,
	createTarHeader,
	findUstarSplit,
	type TarEncoder,
	toTarPath,
} from "./pack";
export {
	basename,
	decodeUtf8,
	dirname,
	getRootComponent,
	isAbsolute,
	isNFC,
	joinPath,
	normalizeSeparators,
	type PathValidation,
	splitPath,
	toLowercase,
	toNFC,
	trimSlashes,
	validateArchivePath,
} from "./path";
export type {
	ArchiveEntry,
	EntryKind,
	TarEntry,
	TarEntryInfo,
	TarEntryKind,
	TarVisitor,
} from "./types";
export {
	isValidTar,
	iterateTar,
	readTar,
	readTarFile,
	readTarInfo,
} from "./unpack";
export { streamToBuffer } from "./utils";
export { VariantName } from "./variant";
