import { err, ok, type Result } from "../core/errors";

/**
 * Typed options for each command, converted from commander's untyped option
 * bag once, before the engine is called.
 */
export type CreateOptions = { name: string; outputDir: string };

export type AddOptions = {
	packagePath: string;
	variant: string;
	files: string;
	main?: string;
	yes: boolean;
};

export type RemoveOptions = {
	packagePath: string;
	variant: string;
	yes: boolean;
};

export type ExtractOptions = {
	packagePath: string;
	variant?: string;
	outputDir: string;
};

export type PackageOptions = { packagePath: string };

type RawOptions = Record<string, unknown>;

const stringOption = (raw: RawOptions, key: string): string | undefined => {
	const value = raw[key];
	return typeof value === "string" && value.length > 0 ? value : undefined;
};

const requireString = (
	value: unknown,
	message: string,
): Result<string> => {
	return typeof value === "string" && value.length > 0
		? ok(value)
		: err("INVALID_ARGUMENT", message);
};

export const parseCreateOptions = (
	name: unknown,
	raw: RawOptions,
): Result<CreateOptions> => {
	const parsedName = requireString(name, "Missing package name");
	if (!parsedName.ok) return parsedName;

	return ok({
		name: parsedName.value,
		outputDir: stringOption(raw, "output") ?? ".",
	});
};

export const parseAddOptions = (
	packagePath: unknown,
	raw: RawOptions,
): Result<AddOptions> => {
	const parsedPath = requireString(packagePath, "Missing package path");
	if (!parsedPath.ok) return parsedPath;

	const variant = requireString(raw.variant, "Missing --variant option");
	if (!variant.ok) return variant;

	const files = requireString(raw.files, "Missing --files option");
	if (!files.ok) return files;

	return ok({
		packagePath: parsedPath.value,
		variant: variant.value,
		files: files.value,
		main: stringOption(raw, "main"),
		yes: raw.yes === true,
	});
};

export const parseRemoveOptions = (
	packagePath: unknown,
	raw: RawOptions,
): Result<RemoveOptions> => {
	const parsedPath = requireString(packagePath, "Missing package path");
	if (!parsedPath.ok) return parsedPath;

	const variant = requireString(raw.variant, "Missing --variant option");
	if (!variant.ok) return variant;

	return ok({
		packagePath: parsedPath.value,
		variant: variant.value,
		yes: raw.yes === true,
	});
};

export const parseExtractOptions = (
	packagePath: unknown,
	raw: RawOptions,
): Result<ExtractOptions> => {
	const parsedPath = requireString(packagePath, "Missing package path");
	if (!parsedPath.ok) return parsedPath;

	return ok({
		packagePath: parsedPath.value,
		variant: stringOption(raw, "variant"),
		outputDir: stringOption(raw, "output") ?? ".",
	});
};

export const parsePackageOptions = (
	packagePath: unknown,
): Result<PackageOptions> => {
	const parsedPath = requireString(packagePath, "Missing package path");
	if (!parsedPath.ok) return parsedPath;
	return ok({ packagePath: parsedPath.value });
};
