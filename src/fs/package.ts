import { randomUUID } from "node:crypto";
import * as path from "node:path";
import semver from "semver";
import { compress, decompress } from "../core/compression";
import {
	ALLOWED_ROOT_ENTRIES,
	MANIFEST_FILE,
	SIGNATURE_FILE,
	VARIANTS_DIR,
} from "../core/constants";
import {
	err,
	fail,
	LgxError,
	ok,
	type Result,
	toLgxError,
	withContext,
} from "../core/errors";
import { Manifest } from "../core/manifest";
import { createTarEncoder } from "../core/pack";
import {
	decodeUtf8,
	getRootComponent,
	splitPath,
	toLowercase,
	trimSlashes,
	validateArchivePath,
} from "../core/path";
import type { ArchiveEntry, TarEntry } from "../core/types";
import { readTar } from "../core/unpack";
import { VariantName } from "../core/variant";
import { createNodeFileSystem, silentLogger } from "./filesystem";
import { isWithin, resolveWithin } from "./path";
import { stageSource } from "./staging";
import type {
	FileSystem,
	Logger,
	PackageEngineOptions,
	PackageStatus,
	VerifyResult,
} from "./types";

interface LoadedPackage {
	status: Exclude<PackageStatus, "unloaded">;
	/** Where the package was loaded from, created at or last saved to. */
	path: string;
	manifest: Manifest;
	/** Every entry except `manifest.json`, paths without trailing slashes. */
	entries: ArchiveEntry[];
}

interface DecodedPackage {
	manifest: Manifest;
	entries: TarEntry[];
}

const EMPTY = new Uint8Array(0);

/**
 * Decodes `.lgx` bytes down to the parsed manifest and the raw tar entries.
 * Every failure is a load error.
 */
function decodePackage(bytes: Uint8Array): Result<DecodedPackage> {
	const tar = decompress(bytes);
	if (!tar.ok) return fail(withContext(tar.error, "Failed to decompress"));

	const entries = readTar(tar.value);
	if (!entries.ok) return fail(withContext(entries.error, "Failed to read tar"));

	// Each path may appear once; the encoder cannot write a repeat back.
	const seen = new Set<string>();
	for (const entry of entries.value) {
		const entryPath = trimSlashes(entry.path);
		if (seen.has(entryPath)) {
			return err("TAR_DUPLICATE_ENTRY", `Duplicate entry: ${entryPath}`, {
				entryName: entryPath,
				offset: entry.offset,
			});
		}
		seen.add(entryPath);
	}

	const manifestEntry = entries.value.find(
		(entry) => entry.kind === "file" && trimSlashes(entry.path) === MANIFEST_FILE,
	);
	if (manifestEntry === undefined) {
		return err("MANIFEST_MISSING", "Missing manifest.json", {
			entryName: MANIFEST_FILE,
		});
	}

	const text = decodeUtf8(manifestEntry.data);
	if (!text.ok) {
		return fail(withContext(text.error, "Failed to parse manifest"));
	}

	const manifest = Manifest.parse(text.value);
	if (!manifest.ok) {
		return fail(withContext(manifest.error, "Failed to parse manifest"));
	}

	return ok({ manifest: manifest.value, entries: entries.value });
}

/** Parent directories of a path, outermost first: `a/b/c` gives `a`, `a/b`. */
function requiredDirectories(entryPath: string): string[] {
	const segments = splitPath(entryPath);
	return segments
		.slice(0, -1)
		.map((_, index) => segments.slice(0, index + 1).join("/"));
}

async function readBytes(
	fileSystem: FileSystem,
	filePath: string,
): Promise<Result<Uint8Array>> {
	try {
		return ok(await fileSystem.readFile(filePath));
	} catch (error) {
		return fail(toLgxError(error, "IO_READ", `Cannot open file: ${filePath}`));
	}
}

/**
 * Loads, edits and writes one `.lgx` package.
 *
 * An engine starts unloaded; {@link PackageEngine.create} or
 * {@link PackageEngine.load} give it a package. Operations on an unloaded
 * engine fail with `PACKAGE_NOT_LOADED`. A failed operation leaves the
 * in-memory package as it was.
 *
 * @example
 * ```typescript
 * import { PackageEngine } from 'lgx/fs';
 *
 * const engine = new PackageEngine();
 * await engine.create("hello.lgx", "hello");
 * await engine.addVariant("web", "./dist", "index.js");
 * await engine.save();
 * ```
 */
export class PackageEngine {
	private readonly fileSystem: FileSystem;
	private readonly logger: Logger;
	private current: LoadedPackage | null = null;

	constructor(options: PackageEngineOptions = {}) {
		this.fileSystem = options.fileSystem ?? createNodeFileSystem();
		this.logger = options.logger ?? silentLogger;
	}

	get status(): PackageStatus {
		return this.current?.status ?? "unloaded";
	}

	/** Path the package was loaded from, created at or last saved to. */
	get path(): string | undefined {
		return this.current?.path;
	}

	/**
	 * A copy of the manifest.
	 *
	 * @throws {LgxError} `PACKAGE_NOT_LOADED`
	 */
	get manifest(): Manifest {
		return this.requireLoaded().manifest.clone();
	}

	/**
	 * Copies of the stored entries, `manifest.json` excluded.
	 *
	 * @throws {LgxError} `PACKAGE_NOT_LOADED`
	 */
	get entries(): ArchiveEntry[] {
		return this.requireLoaded().entries.map((entry) => ({
			...entry,
			data: entry.data.slice(),
		}));
	}

	/**
	 * Creates a new package holding only a skeleton manifest and an empty
	 * `variants/` directory, and saves it to `outputPath`.
	 */
	async create(outputPath: string, name: string): Promise<Result> {
		if (await this.fileSystem.exists(outputPath)) {
			return err("PACKAGE_EXISTS", `File already exists: ${outputPath}`, {
				entryName: outputPath,
			});
		}

		const previous = this.current;
		this.current = {
			status: "modified",
			path: outputPath,
			manifest: Manifest.skeleton(name),
			entries: [{ path: VARIANTS_DIR, kind: "directory", data: EMPTY }],
		};

		const saved = await this.save();
		if (!saved.ok) this.current = previous;
		return saved;
	}

	/** Reads a package from disk, replacing whatever this engine held. */
	async load(filePath: string): Promise<Result> {
		const bytes = await readBytes(this.fileSystem, filePath);
		if (!bytes.ok) return bytes;

		const decoded = decodePackage(bytes.value);
		if (!decoded.ok) return decoded;

		const entries: ArchiveEntry[] = [];
		for (const entry of decoded.value.entries) {
			const entryPath = trimSlashes(entry.path);
			if (entryPath === MANIFEST_FILE) continue;

			if (entry.kind === "file" || entry.kind === "directory") {
				entries.push({ path: entryPath, kind: entry.kind, data: entry.data });
			} else {
				this.logger.warn({
					message: `Ignoring ${entry.kind} entry ${entry.path} in ${filePath}`,
				});
			}
		}

		this.current = {
			status: "loaded",
			path: filePath,
			manifest: decoded.value.manifest,
			entries,
		};
		this.logger.debug({
			message: `Loaded ${filePath} (${entries.length} entries)`,
		});
		return ok(undefined);
	}

	/**
	 * Writes the package to `filePath`, or back to where it came from.
	 *
	 * The archive is built in memory and written to a temporary sibling that
	 * then replaces the destination, so an existing file is never left
	 * truncated.
	 */
	async save(filePath?: string): Promise<Result> {
		const current = this.current;
		if (current === null) return this.notLoaded();

		const target = filePath ?? current.path;

		let archive: Uint8Array;
		try {
			archive = compress(this.encode(current));
		} catch (error) {
			return fail(toLgxError(error, "IO_WRITE", `Cannot encode ${target}`));
		}

		const tempPath = path.join(
			path.dirname(target),
			`.${path.basename(target)}.${randomUUID()}.tmp`,
		);

		try {
			await this.fileSystem.writeFile(tempPath, archive);
			await this.fileSystem.rename(tempPath, target);
		} catch (error) {
			await this.fileSystem.rm(tempPath);
			return fail(toLgxError(error, "IO_WRITE", `Cannot write file: ${target}`));
		}

		this.current = { ...current, status: "saved", path: target };
		this.logger.debug({
			message: `Saved ${target} (${archive.length} bytes)`,
		});
		return ok(undefined);
	}

	/**
	 * Checks a package on disk. Problems are collected rather than stopping at
	 * the first one; a package that cannot be loaded reports only the load
	 * error.
	 */
	static async verify(
		filePath: string,
		options: PackageEngineOptions = {},
	): Promise<VerifyResult> {
		const fileSystem = options.fileSystem ?? createNodeFileSystem();
		const errors: string[] = [];
		const warnings: string[] = [];

		const bytes = await readBytes(fileSystem, filePath);
		const decoded = bytes.ok ? decodePackage(bytes.value) : bytes;
		if (!decoded.ok) {
			return { valid: false, errors: [decoded.error.message], warnings };
		}

		const { manifest, entries } = decoded.value;

		for (const message of manifest.validateFields().errors) {
			errors.push(`Manifest: ${message}`);
		}
		if (semver.valid(manifest.version) === null) {
			warnings.push(`Package version '${manifest.version}' is not valid semver`);
		}

		const forbiddenRoots = new Set<string>();
		const variantDirs = new Set<string>();
		let hasVariantsDir = false;

		for (const entry of entries) {
			const root = getRootComponent(entry.path);
			const segments = splitPath(entry.path);

			if (!ALLOWED_ROOT_ENTRIES.has(root) && !forbiddenRoots.has(root)) {
				forbiddenRoots.add(root);
				errors.push(`Forbidden root entry: ${root}`);
			}

			if (entry.kind !== "file" && entry.kind !== "directory") {
				errors.push(`Forbidden entry type (${entry.kind}): ${entry.path}`);
			}

			if (root === SIGNATURE_FILE) {
				warnings.push(`${SIGNATURE_FILE} is present but signatures are not verified`);
			}

			if (root === VARIANTS_DIR) {
				hasVariantsDir = true;
				if (segments.length >= 2) variantDirs.add(toLowercase(segments[1]));
				if (segments.length === 2 && entry.kind !== "directory") {
					errors.push(`File directly under variants/: ${entry.path}`);
				}
			}

			const validation = validateArchivePath(entry.path);
			if (!validation.valid) {
				errors.push(`Invalid path '${entry.path}': ${validation.reason}`);
			}
		}

		if (!hasVariantsDir) errors.push("Missing variants/ directory");

		errors.push(...manifest.validateCompleteness(variantDirs).errors);

		const files = new Set(
			entries
				.filter((entry) => entry.kind === "file")
				.map((entry) => trimSlashes(entry.path)),
		);
		for (const [variant, mainPath] of manifest.sortedMain()) {
			if (!files.has(`${VARIANTS_DIR}/${variant}/${mainPath}`)) {
				errors.push(`main[${variant}] points to non-existent file: ${mainPath}`);
			}
		}

		return { valid: errors.length === 0, errors, warnings };
	}

	/**
	 * Adds a variant from a file or directory on disk, replacing any variant of
	 * the same name. A directory's contents land under `variants/<variant>/`
	 * and need an explicit `mainPath`; a single file lands at
	 * `variants/<variant>/<file name>` and is its own default main entry.
	 */
	async addVariant(
		variant: string,
		sourcePath: string,
		mainPath?: string,
	): Promise<Result> {
		const current = this.current;
		if (current === null) return this.notLoaded();

		const name = VariantName.from(variant);
		if (!name.ok) return name;

		try {
			if (!(await this.fileSystem.exists(sourcePath))) {
				return err("SOURCE_NOT_FOUND", `Path does not exist: ${sourcePath}`, {
					entryName: sourcePath,
				});
			}

			const source = await this.fileSystem.stat(sourcePath);
			if (source.kind !== "file" && source.kind !== "directory") {
				return err(
					"SOURCE_UNSUPPORTED",
					`Path is not a regular file or directory: ${sourcePath}`,
					{ entryName: sourcePath },
				);
			}

			const isDirectory = source.kind === "directory";
			const fileName = path.basename(sourcePath);
			const resolvedMain = mainPath ?? (isDirectory ? undefined : fileName);
			if (resolvedMain === undefined) {
				return err(
					"MAIN_REQUIRED",
					"A main path is required when the source is a directory",
				);
			}

			const validation = validateArchivePath(resolvedMain);
			if (!validation.valid) {
				return err("PATH_INVALID", `Invalid main path: ${validation.reason}`, {
					entryName: resolvedMain,
				});
			}

			const staged = await stageSource(
				this.fileSystem,
				this.logger,
				sourcePath,
				isDirectory
					? name.value.directory
					: `${name.value.directory}/${fileName}`,
			);
			if (!staged.ok) return staged;

			const variantDir: ArchiveEntry = {
				path: name.value.directory,
				kind: "directory",
				data: EMPTY,
			};
			const manifest = current.manifest.clone();
			manifest.setMain(name.value.value, resolvedMain);

			// Replace, never merge: drop everything the variant held before.
			const kept = current.entries.filter(
				(entry) => !name.value.contains(entry.path),
			);
			const added = isDirectory ? staged.value : [variantDir, ...staged.value];

			this.current = {
				...current,
				status: "modified",
				manifest,
				entries: [...kept, ...added],
			};
			this.logger.debug({
				message: `Staged variant '${name.value}' with ${added.length} entries`,
			});
			return ok(undefined);
		} catch (error) {
			return fail(
				toLgxError(error, "IO_READ", `Cannot add variant from ${sourcePath}`),
			);
		}
	}

	/** Drops a variant's entries and its main entry. */
	removeVariant(variant: string): Result {
		const current = this.current;
		if (current === null) return this.notLoaded();

		const name = VariantName.from(variant);
		if (!name.ok) return name;

		if (!this.hasVariant(name.value.value)) {
			return err("VARIANT_NOT_FOUND", `Variant does not exist: ${variant}`, {
				entryName: variant,
			});
		}

		const manifest = current.manifest.clone();
		manifest.removeMain(name.value.value);

		this.current = {
			...current,
			status: "modified",
			manifest,
			entries: current.entries.filter(
				(entry) => !name.value.contains(entry.path),
			),
		};
		return ok(undefined);
	}

	/**
	 * Case-insensitive.
	 *
	 * @throws {LgxError} `PACKAGE_NOT_LOADED`
	 */
	hasVariant(variant: string): boolean {
		const { entries } = this.requireLoaded();
		const name = VariantName.from(variant);
		if (!name.ok) return false;
		return entries.some((entry) => name.value.contains(entry.path));
	}

	/**
	 * Names of the variant directories present, lowercase and sorted.
	 *
	 * @throws {LgxError} `PACKAGE_NOT_LOADED`
	 */
	getVariants(): string[] {
		const variants = new Set<string>();
		for (const entry of this.requireLoaded().entries) {
			const segments = splitPath(entry.path);
			if (segments.length >= 2 && segments[0] === VARIANTS_DIR) {
				variants.add(toLowercase(segments[1]));
			}
		}
		return [...variants].sort();
	}

	/**
	 * True only if the variant has a main entry and it differs from
	 * `candidate`.
	 *
	 * @throws {LgxError} `PACKAGE_NOT_LOADED`
	 */
	wouldMainChange(variant: string, candidate: string): boolean {
		const current = this.requireLoaded().manifest.getMain(variant);
		return current !== undefined && current !== candidate;
	}

	/**
	 * Applies `edit` to a copy of the manifest and keeps the copy. `main`
	 * should be changed through the variant operations instead.
	 */
	updateManifest(edit: (manifest: Manifest) => void): Result {
		const current = this.current;
		if (current === null) return this.notLoaded();

		const manifest = current.manifest.clone();
		edit(manifest);
		this.current = { ...current, status: "modified", manifest };
		return ok(undefined);
	}

	/**
	 * Writes the variant's files to `outputDir/<variant>/`. Every target is
	 * checked to stay inside that directory.
	 */
	async extractVariant(variant: string, outputDir: string): Promise<Result> {
		const current = this.current;
		if (current === null) return this.notLoaded();

		const name = VariantName.from(variant);
		if (!name.ok) return name;

		if (!this.hasVariant(name.value.value)) {
			return err("VARIANT_NOT_FOUND", `Variant does not exist: ${variant}`, {
				entryName: variant,
			});
		}

		const outputRoot = path.resolve(outputDir);
		const variantRoot = path.resolve(outputRoot, name.value.value);
		if (!isWithin(variantRoot, outputRoot)) {
			return err(
				"PATH_INVALID",
				`Path traversal attempt detected: variant "${name.value}" resolves outside "${outputRoot}".`,
			);
		}

		const prefix = `${name.value.directory}/`;

		try {
			await this.fileSystem.mkdir(variantRoot);

			for (const entry of current.entries) {
				if (!entry.path.startsWith(prefix)) continue;

				const target = resolveWithin(variantRoot, entry.path.slice(prefix.length));
				if (!target.ok) return target;

				if (entry.kind === "directory") {
					await this.fileSystem.mkdir(target.value);
				} else {
					await this.fileSystem.mkdir(path.dirname(target.value));
					await this.fileSystem.writeFile(target.value, entry.data);
				}
			}
		} catch (error) {
			return fail(
				toLgxError(error, "IO_WRITE", `Cannot extract variant '${name.value}'`),
			);
		}

		this.logger.debug({
			message: `Extracted variant '${name.value}' to ${variantRoot}`,
		});
		return ok(undefined);
	}

	/** Extracts every variant, stopping at the first failure. */
	async extractAll(outputDir: string): Promise<Result> {
		if (this.current === null) return this.notLoaded();

		for (const variant of this.getVariants()) {
			const result = await this.extractVariant(variant, outputDir);
			if (!result.ok) return result;
		}
		return ok(undefined);
	}

	/** Tar bytes for the package: manifest, parents of every path, entries. */
	private encode(current: LoadedPackage): Uint8Array {
		const encoder = createTarEncoder();
		const directories = new Set<string>();

		const addDirectory = (directory: string) => {
			if (directories.has(directory)) return;
			directories.add(directory);
			encoder.addDirectory(directory);
		};

		encoder.addFile(MANIFEST_FILE, current.manifest.serialize());

		for (const entry of current.entries) {
			for (const directory of requiredDirectories(entry.path)) {
				addDirectory(directory);
			}

			if (entry.kind === "directory") {
				addDirectory(trimSlashes(entry.path));
			} else {
				encoder.addFile(entry.path, entry.data);
			}
		}

		addDirectory(VARIANTS_DIR);
		return encoder.finalize();
	}

	private requireLoaded(): LoadedPackage {
		if (this.current === null) {
			throw new LgxError("PACKAGE_NOT_LOADED", "No package is loaded");
		}
		return this.current;
	}

	private notLoaded(): Result<never> {
		return err("PACKAGE_NOT_LOADED", "No package is loaded");
	}
}
