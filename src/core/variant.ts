import { VARIANTS_DIR } from "./constants";
import { err, ok, type Result } from "./errors";
import { toLowercase, toNFC } from "./path";

/**
 * A variant identifier in its one stored form: NFC, lowercase, a single path
 * segment. Instances only come from {@link VariantName.from}, so any two
 * names can be compared with `===` on {@link VariantName.value}.
 */
export class VariantName {
	private constructor(readonly value: string) {}

	static from(raw: string): Result<VariantName> {
		const nfc = toNFC(raw);
		if (!nfc.ok) {
			return err("VARIANT_INVALID", `Invalid variant name: ${nfc.error.message}`, {
				entryName: raw,
			});
		}

		// Lowercasing can produce decomposed sequences, so normalize again.
		const value = toLowercase(nfc.value).normalize("NFC");

		if (value.length === 0) {
			return err("VARIANT_INVALID", "Variant name cannot be empty");
		}

		if (
			value.includes("/") ||
			value.includes("\\") ||
			value === "." ||
			value === ".."
		) {
			return err(
				"VARIANT_INVALID",
				`Variant name "${raw}" must be a single path segment`,
				{ entryName: raw },
			);
		}

		return ok(new VariantName(value));
	}

	/** Archive directory holding the variant, e.g. `variants/linux-amd64`. */
	get directory(): string {
		return `${VARIANTS_DIR}/${this.value}`;
	}

	/** Returns true if `path` is the variant directory or lies beneath it. */
	contains(path: string): boolean {
		const trimmed = path.endsWith("/") ? path.slice(0, -1) : path;
		return (
			trimmed === this.directory || trimmed.startsWith(`${this.directory}/`)
		);
	}

	toString(): string {
		return this.value;
	}
}
