import * as path from "node:path";
import { err, fail, ok, type Result, toLgxError } from "../core/errors";
import { toNFC, validateArchivePath } from "../core/path";
import type { ArchiveEntry } from "../core/types";
import type { FileSystem, Logger } from "./types";

interface StagingContext {
	fileSystem: FileSystem;
	logger: Logger;
	entries: ArchiveEntry[];
	/** Source path each staged archive path came from. */
	sources: Map<string, string>;
}

// NFC-normalizes and validates a path before it joins the staged set.
function toArchivePath(archivePath: string): Result<string> {
	const normalized = toNFC(archivePath);
	if (!normalized.ok) {
		return err(
			"PATH_NOT_NORMALIZABLE",
			`Failed to NFC-normalize path: ${archivePath}`,
			{ entryName: archivePath, cause: normalized.error },
		);
	}

	const validation = validateArchivePath(normalized.value);
	if (!validation.valid) {
		return err(
			"PATH_INVALID",
			`Invalid path '${normalized.value}': ${validation.reason}`,
			{ entryName: normalized.value },
		);
	}

	return normalized;
}

// Two source names that differ only in Unicode form normalize to one path.
function claim(
	context: StagingContext,
	archivePath: string,
	sourcePath: string,
): Result {
	const previous = context.sources.get(archivePath);
	if (previous !== undefined) {
		return err(
			"PATH_INVALID",
			`Paths '${previous}' and '${sourcePath}' both normalize to '${archivePath}'`,
			{ entryName: archivePath },
		);
	}
	context.sources.set(archivePath, sourcePath);
	return ok(undefined);
}

async function stageFile(
	context: StagingContext,
	sourcePath: string,
	archivePath: string,
): Promise<Result> {
	const target = toArchivePath(archivePath);
	if (!target.ok) return target;
	const claimed = claim(context, target.value, sourcePath);
	if (!claimed.ok) return claimed;

	try {
		const data = await context.fileSystem.readFile(sourcePath);
		context.entries.push({ path: target.value, kind: "file", data });
		return ok(undefined);
	} catch (error) {
		return fail(toLgxError(error, "IO_READ", `Cannot read file: ${sourcePath}`));
	}
}

async function stageDirectory(
	context: StagingContext,
	sourcePath: string,
	archivePath: string,
): Promise<Result> {
	const target = toArchivePath(archivePath);
	if (!target.ok) return target;
	const claimed = claim(context, target.value, sourcePath);
	if (!claimed.ok) return claimed;

	context.entries.push({
		path: target.value,
		kind: "directory",
		data: new Uint8Array(0),
	});

	let names: string[];
	try {
		names = await context.fileSystem.readdir(sourcePath);
	} catch (error) {
		return fail(
			toLgxError(error, "IO_READ", `Cannot read directory: ${sourcePath}`),
		);
	}

	for (const name of names) {
		const childSource = path.join(sourcePath, name);
		const childArchive = `${target.value}/${name}`;
		const stat = await context.fileSystem.lstat(childSource);

		let result: Result;
		if (stat.kind === "directory") {
			result = await stageDirectory(context, childSource, childArchive);
		} else if (stat.kind === "file") {
			result = await stageFile(context, childSource, childArchive);
		} else {
			context.logger.warn({
				message: `Skipping ${stat.kind} ${childSource}: only regular files and directories are packaged`,
			});
			continue;
		}

		if (!result.ok) return result;
	}

	return ok(undefined);
}

/**
 * Reads a file or directory tree into archive entries rooted at
 * `archiveBase`. A directory's own entry is included; symlinks and special
 * files inside it are skipped with a warning. Nothing is returned unless
 * every path could be staged.
 */
export async function stageSource(
	fileSystem: FileSystem,
	logger: Logger,
	sourcePath: string,
	archiveBase: string,
): Promise<Result<ArchiveEntry[]>> {
	const context: StagingContext = {
		fileSystem,
		logger,
		entries: [],
		sources: new Map(),
	};

	const stat = await fileSystem.stat(sourcePath);
	const result =
		stat.kind === "directory"
			? await stageDirectory(context, sourcePath, archiveBase)
			: await stageFile(context, sourcePath, archiveBase);

	if (!result.ok) return result;
	logger.debug({
		message: `Staged ${context.entries.length} entries from ${sourcePath}`,
	});
	return ok(context.entries);
}
