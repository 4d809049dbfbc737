import * as path from "node:path";
import type { Command } from "commander";
import { PACKAGE_EXTENSION } from "../../core/constants";
import { toLowercase } from "../../core/path";
import { PackageEngine } from "../../fs/package";
import type { CommandContext, GetContext } from "../context";
import { success } from "../logger";
import { type CreateOptions, parseCreateOptions } from "../options";
import { reportFailure, runCommand } from "./shared";

/**
 * Create `<outputDir>/<name>.lgx` holding an empty skeleton package.
 */
export const runCreate = async (
	options: CreateOptions,
	context: CommandContext,
): Promise<number> => {
	const fileName = `${toLowercase(options.name)}${PACKAGE_EXTENSION}`;
	const filePath =
		options.outputDir === "."
			? fileName
			: path.join(options.outputDir, fileName);

	const engine = new PackageEngine(context.engine);
	const result = await engine.create(filePath, options.name);
	if (!result.ok) return reportFailure({ result });

	success({ message: `Created package: ${filePath}` });
	return 0;
};

export const registerCreateCommand = (args: {
	program: Command;
	getContext: GetContext;
}): void => {
	const { program, getContext } = args;

	program
		.command("create")
		.description("Create a new skeleton package")
		.argument("<name>", "Package name (stored lowercase)")
		.option("-o, --output <dir>", "Directory to write the package to", ".")
		.action(async (name: string, options: Record<string, unknown>) => {
			await runCommand({
				parsed: parseCreateOptions(name, options),
				run: (parsed) => runCreate(parsed, getContext()),
			});
		});
};
