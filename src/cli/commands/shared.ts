import type { Result } from "../../core/errors";
import { createNodeFileSystem } from "../../fs/filesystem";
import { PackageEngine } from "../../fs/package";
import type { FileSystem } from "../../fs/types";
import type { CommandContext } from "../context";
import { error } from "../logger";

export const fileSystemOf = (context: CommandContext): FileSystem => {
	return context.engine.fileSystem ?? createNodeFileSystem();
};

/**
 * Load the package at `packagePath`, reporting failures.
 *
 * @returns The loaded engine, or null after an error has been printed
 */
export const openPackage = async (args: {
	packagePath: string;
	context: CommandContext;
}): Promise<PackageEngine | null> => {
	const { packagePath, context } = args;

	if (!(await fileSystemOf(context).exists(packagePath))) {
		error({ message: `Package not found: ${packagePath}` });
		return null;
	}

	const engine = new PackageEngine(context.engine);
	const loaded = await engine.load(packagePath);
	if (!loaded.ok) {
		error({ message: `Failed to load package: ${loaded.error.message}` });
		return null;
	}

	return engine;
};

/**
 * Print a failed result and return the exit code for it.
 */
export const reportFailure = (args: {
	result: Result<unknown>;
	context?: string;
}): number => {
	const { result, context } = args;
	if (result.ok) return 0;

	const message = context
		? `${context}: ${result.error.message}`
		: result.error.message;
	error({ message });
	return 1;
};

/**
 * Parse options and run a command, setting the process exit code from its
 * result.
 */
export const runCommand = async <T>(args: {
	parsed: Result<T>;
	run: (options: T) => Promise<number>;
}): Promise<void> => {
	const { parsed, run } = args;

	if (!parsed.ok) {
		process.exitCode = reportFailure({ result: parsed });
		return;
	}

	process.exitCode = await run(parsed.value);
};
