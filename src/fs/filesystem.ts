import type { Stats } from "node:fs";
import * as fs from "node:fs/promises";
import type { FileKind, FileStat, FileSystem, Logger } from "./types";

function kindOf(stat: Stats): FileKind {
	if (stat.isFile()) return "file";
	if (stat.isDirectory()) return "directory";
	if (stat.isSymbolicLink()) return "symlink";
	return "other";
}

function isNotFound(err: unknown): boolean {
	return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** {@link FileSystem} over `node:fs/promises`. */
export function createNodeFileSystem(): FileSystem {
	return {
		async readFile(path) {
			const buffer = await fs.readFile(path);
			return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
		},

		async writeFile(path, data) {
			await fs.writeFile(path, data);
		},

		async rename(from, to) {
			await fs.rename(from, to);
		},

		async rm(path) {
			await fs.rm(path, { recursive: true, force: true });
		},

		async mkdir(path) {
			await fs.mkdir(path, { recursive: true });
		},

		async exists(path) {
			try {
				await fs.lstat(path);
				return true;
			} catch (err) {
				if (isNotFound(err)) return false;
				throw err;
			}
		},

		async isDirectory(path) {
			try {
				return (await fs.stat(path)).isDirectory();
			} catch (err) {
				if (isNotFound(err)) return false;
				throw err;
			}
		},

		async stat(path) {
			const stat = await fs.stat(path);
			return { kind: kindOf(stat) };
		},

		async lstat(path) {
			const stat = await fs.lstat(path);
			return { kind: kindOf(stat) };
		},

		async readdir(path) {
			const names = await fs.readdir(path);
			return names.sort();
		},
	};
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
};
