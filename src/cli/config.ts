/** Settings for one CLI run. */
export type CliConfig = {
	/** Print debug logging (`LGX_DEBUG=1`). */
	debug: boolean;
	/** Answer every confirmation with yes (`LGX_ASSUME_YES=1` or `--yes`). */
	assumeYes: boolean;
	/** Colour output; off under `NO_COLOR` or when stdout is not a TTY. */
	color: boolean;
	/** Only print errors (`--silent`). */
	silent: boolean;
};

const TRUTHY = new Set(["1", "true", "yes", "on"]);

const isTruthy = (value: string | undefined): boolean => {
	return value != null && TRUTHY.has(value.trim().toLowerCase());
};

/**
 * Merge defaults, environment and command-line flags, later sources winning.
 * @param args - Configuration sources
 * @param args.env - Environment variables (defaults to `process.env`)
 * @param args.flags - Global command-line flags
 * @param args.isTTY - Whether stdout is a terminal
 *
 * @returns The resolved configuration
 */
export const resolveConfig = (args: {
	env?: NodeJS.ProcessEnv;
	flags?: { silent?: boolean; yes?: boolean };
	isTTY?: boolean;
}): CliConfig => {
	const { env = process.env, flags = {}, isTTY = false } = args;

	return {
		debug: isTruthy(env.LGX_DEBUG),
		assumeYes: flags.yes ?? isTruthy(env.LGX_ASSUME_YES),
		// NO_COLOR disables colour whenever it is set to a non-empty value.
		color: isTTY && !env.NO_COLOR,
		silent: flags.silent ?? false,
	};
};
