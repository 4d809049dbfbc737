import { Command } from "commander";
import { registerAddCommand } from "./commands/add";
import { registerCreateCommand } from "./commands/create";
import { registerExtractCommand } from "./commands/extract";
import { registerRemoveCommand } from "./commands/remove";
import { registerStubCommands } from "./commands/stubs";
import { registerVerifyCommand } from "./commands/verify";
import { resolveConfig } from "./config";
import type { CommandContext } from "./context";
import { cliLogger, setColorMode, setDebugMode, setSilentMode } from "./logger";
import { createReadlinePrompt } from "./prompt";

export const VERSION = "0.1.0";

/**
 * Build the `lgx` command tree.
 * @param args - Program arguments
 * @param args.createContext - Builds the command context from the resolved
 * global flags; tests use it to inject a prompt or filesystem
 *
 * @returns The commander program, not yet parsed
 */
export const createProgram = (
	args: {
		createContext?: (base: CommandContext) => CommandContext;
	} = {},
): Command => {
	const { createContext = (base) => base } = args;
	const program = new Command();
	let context: CommandContext | null = null;

	const getContext = (): CommandContext => {
		if (context == null) {
			const flags = program.opts<{ silent?: boolean }>();
			const config = resolveConfig({
				flags: { silent: flags.silent },
				isTTY: process.stdout.isTTY === true,
			});

			setSilentMode({ silent: config.silent });
			setDebugMode({ debug: config.debug });
			setColorMode({ color: config.color });

			context = createContext({
				config,
				prompt: createReadlinePrompt(),
				engine: { logger: cliLogger },
			});
		}
		return context;
	};

	program
		.name("lgx")
		.version(`lgx version ${VERSION}`, "-V, --version")
		.description("lgx - deterministic multi-variant package archives")
		.option("-s, --silent", "Only print errors")
		.addHelpText(
			"after",
			`
Examples:
  $ lgx create mymodule
  $ lgx add mymodule.lgx --variant linux-amd64 --files ./libfoo.so
  $ lgx add mymodule.lgx -v web -f ./dist -m index.js -y
  $ lgx extract mymodule.lgx -v web -o ./out
  $ lgx verify mymodule.lgx
`,
		);

	registerCreateCommand({ program, getContext });
	registerAddCommand({ program, getContext });
	registerRemoveCommand({ program, getContext });
	registerExtractCommand({ program, getContext });
	registerVerifyCommand({ program, getContext });
	registerStubCommands({ program, getContext });

	return program;
};
