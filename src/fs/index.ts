export { createNodeFileSystem, silentLogger } from "./filesystem";
export { PackageEngine } from "./package";
export { isWithin, resolveWithin } from "./path";
export { stageSource } from "./staging";
export type {
	FileKind,
	FileStat,
	FileSystem,
	Logger,
	PackageEngineOptions,
	PackageStatus,
	VerifyResult,
} from "./types";
