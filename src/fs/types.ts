/** What a path on disk is, without following a final symlink for `lstat`. */
export type FileKind = "file" | "directory" | "symlink" | "other";

export interface FileStat {
	kind: FileKind;
}

/**
 * The filesystem operations the package engine performs. The default
 * implementation is {@link createNodeFileSystem}; tests can pass their own.
 */
export interface FileSystem {
	readFile(path: string): Promise<Uint8Array>;
	writeFile(path: string, data: Uint8Array): Promise<void>;
	rename(from: string, to: string): Promise<void>;
	/** Removes a file or directory tree. Missing paths are not an error. */
	rm(path: string): Promise<void>;
	/** Creates a directory and any missing parents. */
	mkdir(path: string): Promise<void>;
	exists(path: string): Promise<boolean>;
	isDirectory(path: string): Promise<boolean>;
	/** Follows symlinks. */
	stat(path: string): Promise<FileStat>;
	/** Does not follow a final symlink. */
	lstat(path: string): Promise<FileStat>;
	/** Entry names of a directory, sorted. */
	readdir(path: string): Promise<string[]>;
}

/** Leveled log sink used by the engine. */
export interface Logger {
	debug(args: { message: string }): void;
	info(args: { message: string }): void;
	warn(args: { message: string }): void;
}

export interface PackageEngineOptions {
	fileSystem?: FileSystem;
	/** Defaults to a logger that discards everything. */
	logger?: Logger;
}

/** Outcome of {@link PackageEngine.verify}. Warnings never make it invalid. */
export interface VerifyResult {
	valid: boolean;
	errors: string[];
	warnings: string[];
}

/**
 * Lifecycle of an engine. `modified` is a loaded package with unsaved
 * changes.
 */
export type PackageStatus = "unloaded" | "loaded" | "modified" | "saved";
