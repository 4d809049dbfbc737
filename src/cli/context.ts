import type { PackageEngineOptions } from "../fs/types";
import type { CliConfig } from "./config";
import type { Prompt } from "./prompt";

/** Everything a command needs besides its own options. */
export type CommandContext = {
	config: CliConfig;
	prompt: Prompt;
	/** Passed to every {@link PackageEngine} the command creates. */
	engine: PackageEngineOptions;
};

/** Resolved once global flags have been parsed. */
export type GetContext = () => CommandContext;
