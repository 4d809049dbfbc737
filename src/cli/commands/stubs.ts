import type { Command } from "commander";
import { err } from "../../core/errors";
import type { GetContext } from "../context";
import { info } from "../logger";
import { parsePackageOptions } from "../options";
import { reportFailure, runCommand } from "./shared";

/** Signing is reserved; the command always fails. */
export const runSign = async (): Promise<number> => {
	return reportFailure({
		result: err("NOT_IMPLEMENTED", "Sign command not implemented in v0.1"),
	});
};

/** Publishing is reserved; the command always succeeds without doing anything. */
export const runPublish = async (): Promise<number> => {
	info({ message: "Publish: no-op in v0.1" });
	return 0;
};

export const registerStubCommands = (args: {
	program: Command;
	getContext: GetContext;
}): void => {
	const { program } = args;

	program
		.command("sign")
		.description("Sign a package (not implemented)")
		.argument("<package>", "Path to the .lgx package")
		.action(async (packagePath: string) => {
			await runCommand({
				parsed: parsePackageOptions(packagePath),
				run: () => runSign(),
			});
		});

	program
		.command("publish")
		.description("Publish a package (no-op)")
		.argument("<package>", "Path to the .lgx package")
		.action(async (packagePath: string) => {
			await runCommand({
				parsed: parsePackageOptions(packagePath),
				run: () => runPublish(),
			});
		});
};
