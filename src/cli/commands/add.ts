import * as path from "node:path";
import type { Command } from "commander";
import { VariantName } from "../../core/variant";
import type { CommandContext, GetContext } from "../context";
import { error, info, success } from "../logger";
import { type AddOptions, parseAddOptions } from "../options";
import {
	fileSystemOf,
	openPackage,
	reportFailure,
	runCommand,
} from "./shared";

/**
 * Question to ask before adding, or null when nothing would be lost.
 */
export const addConfirmationMessage = (args: {
	variant: string;
	variantExists: boolean;
	mainWouldChange: boolean;
}): string | null => {
	const { variant, variantExists, mainWouldChange } = args;

	if (variantExists && mainWouldChange) {
		return `Variant '${variant}' exists and main would change. Replace?`;
	}
	if (variantExists) {
		return `Variant '${variant}' exists and will be replaced. Continue?`;
	}
	if (mainWouldChange) {
		return `main[${variant}] would change. Continue?`;
	}
	return null;
};

/**
 * Add or replace a variant, asking first unless `--yes` was given.
 */
export const runAdd = async (
	options: AddOptions,
	context: CommandContext,
): Promise<number> => {
	const engine = await openPackage({
		packagePath: options.packagePath,
		context,
	});
	if (engine == null) return 1;

	const fileSystem = fileSystemOf(context);
	if (!(await fileSystem.exists(options.files))) {
		error({ message: `Path not found: ${options.files}` });
		return 1;
	}

	const name = VariantName.from(options.variant);
	if (!name.ok) return reportFailure({ result: name });
	const variant = name.value.value;

	const isDirectory = await fileSystem.isDirectory(options.files);
	if (isDirectory && options.main == null) {
		error({ message: "--main is required when --files is a directory" });
		return 1;
	}

	const effectiveMain = options.main ?? path.basename(options.files);
	const variantExists = engine.hasVariant(variant);
	const question = addConfirmationMessage({
		variant,
		variantExists,
		mainWouldChange: engine.wouldMainChange(variant, effectiveMain),
	});

	if (question != null && !options.yes && !context.config.assumeYes) {
		const confirmed = await context.prompt.confirm({ message: question });
		if (!confirmed) {
			info({ message: "Aborted." });
			return 1;
		}
	}

	const added = await engine.addVariant(variant, options.files, options.main);
	if (!added.ok) return reportFailure({ result: added });

	const saved = await engine.save(options.packagePath);
	if (!saved.ok) {
		return reportFailure({ result: saved, context: "Failed to save package" });
	}

	success({
		message: variantExists
			? `Replaced variant '${variant}' in ${options.packagePath}`
			: `Added variant '${variant}' to ${options.packagePath}`,
	});
	return 0;
};

export const registerAddCommand = (args: {
	program: Command;
	getContext: GetContext;
}): void => {
	const { program, getContext } = args;

	program
		.command("add")
		.description("Add files to a package variant")
		.argument("<package>", "Path to the .lgx package")
		.requiredOption("-v, --variant <name>", "Variant name (stored lowercase)")
		.requiredOption("-f, --files <path>", "File or directory to add")
		.option(
			"-m, --main <path>",
			"Entry point within the variant (required for directories)",
		)
		.option("-y, --yes", "Replace without asking")
		.action(async (packagePath: string, options: Record<string, unknown>) => {
			await runCommand({
				parsed: parseAddOptions(packagePath, options),
				run: (parsed) => runAdd(parsed, getContext()),
			});
		});
};
