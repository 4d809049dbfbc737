#!/usr/bin/env node

/**
 * lgx CLI entry point.
 */

import { error } from "./logger";
import { createProgram } from "./program";

const program = createProgram();

// Show help if no command provided
if (process.argv.length < 3) {
	program.help();
}

program.parseAsync(process.argv).catch((err: unknown) => {
	error({ message: err instanceof Error ? err.message : String(err) });
	process.exitCode = 1;
});
