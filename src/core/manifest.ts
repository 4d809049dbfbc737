import Ajv, { type ErrorObject } from "ajv";
import { err, ok, type Result, type ValidationResult } from "./errors";
import { toLowercase, validateArchivePath } from "./path";

/** Manifest format written by this version. */
export const CURRENT_MANIFEST_VERSION = "0.1.0";

/** Package version given to a freshly created package. */
export const INITIAL_PACKAGE_VERSION = "0.0.1";

/** Plain-data shape of `manifest.json`. */
export interface ManifestData {
	manifestVersion: string;
	name: string;
	version: string;
	description: string;
	author: string;
	type: string;
	category: string;
	icon: string;
	dependencies: string[];
	/** Variant name to entry-point path, relative to the variant directory. */
	main: Record<string, string>;
}

// Serialization order, and the order fields are reported in when several are
// wrong at once.
const FIELD_ORDER = [
	"manifestVersion",
	"name",
	"version",
	"description",
	"author",
	"type",
	"category",
	"icon",
	"dependencies",
	"main",
] as const;

type ManifestField = (typeof FIELD_ORDER)[number];

const manifestSchema = {
	type: "object",
	properties: {
		manifestVersion: { type: "string" },
		name: { type: "string" },
		version: { type: "string" },
		description: { type: "string" },
		author: { type: "string" },
		type: { type: "string" },
		category: { type: "string" },
		icon: { type: "string" },
		dependencies: { type: "array", items: { type: "string" } },
		main: { type: "object", additionalProperties: { type: "string" } },
	},
	required: [...FIELD_ORDER],
};

const ajv = new Ajv({ allErrors: true });
const validateManifestSchema = ajv.compile<ManifestData>(manifestSchema);

// Two-space indented JSON object with members in the given order.
function serializeObject(members: [string, string][]): string {
	if (members.length === 0) return "{}";
	const lines = members.map(
		([key, value]) => `  ${JSON.stringify(key)}: ${JSON.stringify(value)}`,
	);
	return `{\n${lines.join(",\n")}\n}`;
}

function isManifestField(value: string): value is ManifestField {
	return FIELD_ORDER.some((field) => field === value);
}

// JSON pointer segments escape "~" and "/".
function unescapePointer(segment: string): string {
	return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

/** Turns one schema error into a field position and a message naming it. */
function describeSchemaError(error: ErrorObject): {
	rank: number;
	message: string;
} {
	const [, field = "", item] = error.instancePath.split("/");

	if (error.keyword === "required") {
		const missing = String(error.params.missingProperty);
		return {
			rank: isManifestField(missing) ? FIELD_ORDER.indexOf(missing) : -1,
			message: `Missing or invalid '${missing}' field`,
		};
	}

	if (!isManifestField(field)) {
		return { rank: -1, message: "Manifest must be a JSON object" };
	}

	const rank = FIELD_ORDER.indexOf(field);
	if (item !== undefined && field === "dependencies") {
		return { rank, message: "Invalid dependency entry (not a string)" };
	}
	if (item !== undefined && field === "main") {
		return {
			rank,
			message: `Invalid main entry for '${unescapePointer(item)}' (not a string)`,
		};
	}
	return { rank, message: `Missing or invalid '${field}' field` };
}

function normalizeKey(variant: string): string {
	return toLowercase(variant).normalize("NFC");
}

/**
 * In-memory `manifest.json`.
 *
 * String fields are plain properties and may be edited directly. Variant
 * entry points go through {@link Manifest.setMain} and friends, which keep
 * the keys lowercase.
 */
export class Manifest {
	manifestVersion: string;
	name: string;
	version: string;
	description: string;
	author: string;
	type: string;
	category: string;
	icon: string;
	dependencies: string[];
	private mainEntries: Map<string, string>;

	/** Builds a manifest from data as given; `main` keys are not normalized. */
	constructor(data: Partial<ManifestData> = {}) {
		this.manifestVersion = data.manifestVersion ?? CURRENT_MANIFEST_VERSION;
		this.name = data.name ?? "";
		this.version = data.version ?? "";
		this.description = data.description ?? "";
		this.author = data.author ?? "";
		this.type = data.type ?? "";
		this.category = data.category ?? "";
		this.icon = data.icon ?? "";
		this.dependencies = [...(data.dependencies ?? [])];
		this.mainEntries = new Map(Object.entries(data.main ?? {}));
	}

	/**
	 * Parses `manifest.json` text. Every field is required and must have the
	 * right JSON type; `main` keys are lowercased.
	 */
	static parse(json: string): Result<Manifest> {
		let value: unknown;
		try {
			value = JSON.parse(json);
		} catch (cause) {
			const detail = cause instanceof Error ? cause.message : String(cause);
			return err("MANIFEST_INVALID_JSON", `JSON parse error: ${detail}`, {
				cause,
			});
		}

		if (!validateManifestSchema(value)) {
			const [first] = (validateManifestSchema.errors ?? [])
				.map(describeSchemaError)
				.sort((a, b) => a.rank - b.rank);

			const message = first?.message ?? "Manifest does not match the schema";
			return err("MANIFEST_SCHEMA", message, { entryName: "manifest.json" });
		}

		const manifest = new Manifest(value);
		manifest.normalizeVariantKeys();
		return ok(manifest);
	}

	/** Manifest for a new, empty package. */
	static skeleton(name: string): Manifest {
		return new Manifest({
			manifestVersion: CURRENT_MANIFEST_VERSION,
			name: toLowercase(name),
			version: INITIAL_PACKAGE_VERSION,
		});
	}

	/**
	 * Only manifest major version `0` is understood: the text before the first
	 * `.` must be exactly `"0"`.
	 */
	static isVersionSupported(version: string): boolean {
		const dot = version.indexOf(".");
		return dot !== -1 && version.slice(0, dot) === "0";
	}

	/**
	 * Entry points keyed by variant. Iteration order of the returned object
	 * follows JavaScript property rules; use {@link Manifest.sortedMain} where
	 * order matters.
	 */
	get main(): Record<string, string> {
		return Object.fromEntries(this.sortedMain());
	}

	/** `[variant, mainPath]` pairs sorted by code unit. */
	sortedMain(): [string, string][] {
		return [...this.mainEntries].sort(([a], [b]) =>
			a < b ? -1 : a > b ? 1 : 0,
		);
	}

	toData(): ManifestData {
		return {
			manifestVersion: this.manifestVersion,
			name: this.name,
			version: this.version,
			description: this.description,
			author: this.author,
			type: this.type,
			category: this.category,
			icon: this.icon,
			dependencies: [...this.dependencies],
			main: this.main,
		};
	}

	clone(): Manifest {
		return new Manifest(this.toData());
	}

	/**
	 * Canonical JSON: fixed field order, `main` keys sorted, two-space
	 * indentation and no trailing newline.
	 */
	serialize(): string {
		const data = this.toData();
		const members = FIELD_ORDER.map((field) => {
			// Integer-like keys would jump ahead in a plain object.
			const value =
				field === "main"
					? serializeObject(this.sortedMain())
					: JSON.stringify(data[field], null, 2);
			return `  ${JSON.stringify(field)}: ${value.replaceAll("\n", "\n  ")}`;
		});
		return `{\n${members.join(",\n")}\n}`;
	}

	/** Checks field contents. All problems are reported, not just the first. */
	validateFields(): ValidationResult {
		const errors: string[] = [];

		if (!Manifest.isVersionSupported(this.manifestVersion)) {
			errors.push(`Unsupported manifest version: ${this.manifestVersion}`);
		}
		if (this.name.length === 0) errors.push("'name' field is empty");
		if (this.version.length === 0) errors.push("'version' field is empty");

		for (const [variant, path] of this.sortedMain()) {
			if (variant !== toLowercase(variant)) {
				errors.push(`Variant key '${variant}' is not lowercase`);
			}

			const validation = validateArchivePath(path);
			if (!validation.valid) {
				errors.push(`Invalid main path for '${variant}': ${validation.reason}`);
			}
		}

		return { valid: errors.length === 0, errors };
	}

	/**
	 * Compares `main` keys against the variant directories present in the
	 * archive. Both sides are lowercased before comparing, and a mismatch in
	 * either direction is an error.
	 */
	validateCompleteness(existingVariants: Iterable<string>): ValidationResult {
		const errors: string[] = [];
		const declared = new Set(this.getVariants());
		const existing = new Set([...existingVariants].map(normalizeKey));

		for (const variant of declared) {
			if (!existing.has(variant)) {
				errors.push(`main[${variant}] has no corresponding variant directory`);
			}
		}
		for (const variant of [...existing].sort()) {
			if (!declared.has(variant)) {
				errors.push(`Variant '${variant}' has no main entry`);
			}
		}

		return { valid: errors.length === 0, errors };
	}

	setMain(variant: string, path: string): void {
		this.mainEntries.set(normalizeKey(variant), path);
	}

	removeMain(variant: string): void {
		this.mainEntries.delete(normalizeKey(variant));
	}

	/** Case-insensitive lookup. */
	getMain(variant: string): string | undefined {
		return this.mainEntries.get(normalizeKey(variant));
	}

	/** Lowercased variant keys of `main`, sorted. */
	getVariants(): string[] {
		return [...new Set([...this.mainEntries.keys()].map(normalizeKey))].sort();
	}

	normalizeName(): void {
		this.name = toLowercase(this.name);
	}

	normalizeVariantKeys(): void {
		const normalized = new Map<string, string>();
		for (const [variant, path] of this.mainEntries) {
			normalized.set(normalizeKey(variant), path);
		}
		this.mainEntries = normalized;
	}
}
