import type { Logger } from "../fs/types";

let silentMode = false;
let debugMode = false;
let colorMode = false;

const ANSI = {
	reset: "\x1b[0m",
	red: "\x1b[31m",
	green: "\x1b[32m",
	yellow: "\x1b[33m",
	gray: "\x1b[90m",
} as const;

type Color = Exclude<keyof typeof ANSI, "reset">;

function paint(color: Color, text: string): string {
	return colorMode ? `${ANSI[color]}${text}${ANSI.reset}` : text;
}

/** Suppresses everything except errors. */
export const setSilentMode = (args: { silent: boolean }): void => {
	silentMode = args.silent;
};

export const setDebugMode = (args: { debug: boolean }): void => {
	debugMode = args.debug;
};

export const setColorMode = (args: { color: boolean }): void => {
	colorMode = args.color;
};

export const info = (args: { message: string }): void => {
	if (!silentMode) console.log(args.message);
};

export const success = (args: { message: string }): void => {
	if (!silentMode) console.log(paint("green", args.message));
};

export const warn = (args: { message: string }): void => {
	if (!silentMode) console.log(paint("yellow", `Warning: ${args.message}`));
};

/** Printed even in silent mode. */
export const error = (args: { message: string }): void => {
	console.error(paint("red", `Error: ${args.message}`));
};

/** Unprefixed line on stderr, for details following an {@link error}. */
export const errorDetail = (args: { message: string }): void => {
	console.error(args.message);
};

export const debug = (args: { message: string }): void => {
	if (debugMode && !silentMode) console.log(paint("gray", args.message));
};

/** The engine's {@link Logger}, printing through this module. */
export const cliLogger: Logger = { debug, info, warn };
