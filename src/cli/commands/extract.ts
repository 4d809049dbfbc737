import type { Command } from "commander";
import { VariantName } from "../../core/variant";
import type { CommandContext, GetContext } from "../context";
import { error, info, success } from "../logger";
import { type ExtractOptions, parseExtractOptions } from "../options";
import { openPackage, reportFailure, runCommand } from "./shared";

/**
 * Extract one variant, or every variant when none is named.
 */
export const runExtract = async (
	options: ExtractOptions,
	context: CommandContext,
): Promise<number> => {
	const engine = await openPackage({
		packagePath: options.packagePath,
		context,
	});
	if (engine == null) return 1;

	if (options.variant == null) {
		const result = await engine.extractAll(options.outputDir);
		if (!result.ok) return reportFailure({ result });

		const count = engine.getVariants().length;
		if (count === 0) {
			info({ message: "No variants to extract" });
		} else {
			success({
				message: `Extracted ${count} variant(s) to ${options.outputDir}`,
			});
		}
		return 0;
	}

	const name = VariantName.from(options.variant);
	if (!name.ok) return reportFailure({ result: name });
	const variant = name.value.value;

	if (!engine.hasVariant(variant)) {
		error({ message: `Variant not found: ${options.variant}` });
		return 1;
	}

	const result = await engine.extractVariant(variant, options.outputDir);
	if (!result.ok) return reportFailure({ result });

	success({
		message: `Extracted variant '${variant}' to ${options.outputDir}`,
	});
	return 0;
};

export const registerExtractCommand = (args: {
	program: Command;
	getContext: GetContext;
}): void => {
	const { program, getContext } = args;

	program
		.command("extract")
		.description("Extract variant contents from a package")
		.argument("<package>", "Path to the .lgx package")
		.option("-v, --variant <name>", "Variant to extract (default: all)")
		.option("-o, --output <dir>", "Directory to extract into", ".")
		.action(async (packagePath: string, options: Record<string, unknown>) => {
			await runCommand({
				parsed: parseExtractOptions(packagePath, options),
				run: (parsed) => runExtract(parsed, getContext()),
			});
		});
};
