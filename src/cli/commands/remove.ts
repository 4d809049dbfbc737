import type { Command } from "commander";
import { VariantName } from "../../core/variant";
import type { CommandContext, GetContext } from "../context";
import { error, info, success } from "../logger";
import { parseRemoveOptions, type RemoveOptions } from "../options";
import { openPackage, reportFailure, runCommand } from "./shared";

export const runRemove = async (
	options: RemoveOptions,
	context: CommandContext,
): Promise<number> => {
	const engine = await openPackage({
		packagePath: options.packagePath,
		context,
	});
	if (engine == null) return 1;

	const name = VariantName.from(options.variant);
	if (!name.ok) return reportFailure({ result: name });
	const variant = name.value.value;

	if (!engine.hasVariant(variant)) {
		error({ message: `Variant not found: ${variant}` });
		return 1;
	}

	if (!options.yes && !context.config.assumeYes) {
		const confirmed = await context.prompt.confirm({
			message: `Remove variant '${variant}'?`,
		});
		if (!confirmed) {
			info({ message: "Aborted." });
			return 1;
		}
	}

	const removed = engine.removeVariant(variant);
	if (!removed.ok) return reportFailure({ result: removed });

	const saved = await engine.save(options.packagePath);
	if (!saved.ok) {
		return reportFailure({ result: saved, context: "Failed to save package" });
	}

	success({ message: `Removed variant '${variant}' from ${options.packagePath}` });
	return 0;
};

export const registerRemoveCommand = (args: {
	program: Command;
	getContext: GetContext;
}): void => {
	const { program, getContext } = args;

	program
		.command("remove")
		.description("Remove a variant from a package")
		.argument("<package>", "Path to the .lgx package")
		.requiredOption("-v, --variant <name>", "Variant to remove")
		.option("-y, --yes", "Remove without asking")
		.action(async (packagePath: string, options: Record<string, unknown>) => {
			await runCommand({
				parsed: parseRemoveOptions(packagePath, options),
				run: (parsed) => runRemove(parsed, getContext()),
			});
		});
};
