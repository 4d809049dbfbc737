import type { Command } from "commander";
import { PackageEngine } from "../../fs/package";
import type { CommandContext, GetContext } from "../context";
import { error, errorDetail, success, warn } from "../logger";
import { type PackageOptions, parsePackageOptions } from "../options";
import { fileSystemOf, runCommand } from "./shared";

/**
 * Print warnings, then either the list of problems or a success line.
 */
export const runVerify = async (
	options: PackageOptions,
	context: CommandContext,
): Promise<number> => {
	if (!(await fileSystemOf(context).exists(options.packagePath))) {
		error({ message: `Package not found: ${options.packagePath}` });
		return 1;
	}

	const result = await PackageEngine.verify(options.packagePath, context.engine);

	for (const warning of result.warnings) {
		warn({ message: warning });
	}

	if (!result.valid) {
		error({ message: "Package validation failed:" });
		for (const problem of result.errors) {
			errorDetail({ message: `  - ${problem}` });
		}
		return 1;
	}

	success({ message: `Package is valid: ${options.packagePath}` });
	return 0;
};

export const registerVerifyCommand = (args: {
	program: Command;
	getContext: GetContext;
}): void => {
	const { program, getContext } = args;

	program
		.command("verify")
		.description("Verify a package is valid")
		.argument("<package>", "Path to the .lgx package")
		.action(async (packagePath: string) => {
			await runCommand({
				parsed: parsePackageOptions(packagePath),
				run: (parsed) => runVerify(parsed, getContext()),
			});
		});
};
