import { err, ok, type Result } from "./errors";
import { strictDecoder } from "./utils";

/** Outcome of {@link validateArchivePath}. */
export type PathValidation = { valid: true } | { valid: false; reason: string };

const DRIVE_LETTER = /^[A-Za-z]:[\\/]/;

// Matches a high surrogate not followed by a low one, or a low surrogate not
// preceded by a high one.
const LONE_SURROGATE =
	/[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Returns true if the string holds text that cannot be encoded as UTF-8. */
export function hasLoneSurrogate(text: string): boolean {
	return LONE_SURROGATE.test(text);
}

/**
 * Normalizes text to Unicode Normalization Form C.
 *
 * Text that is not well-formed (an unpaired surrogate, which is what malformed
 * UTF-8 turns into) is reported as an error rather than passed through.
 */
export function toNFC(text: string): Result<string> {
	if (hasLoneSurrogate(text)) {
		return err(
			"PATH_NOT_NORMALIZABLE",
			`Cannot NFC-normalize "${text}": text is not well-formed Unicode.`,
			{ entryName: text },
		);
	}
	return ok(text.normalize("NFC"));
}

/** Returns true if the text is well-formed and already in NFC. */
export function isNFC(text: string): boolean {
	return !hasLoneSurrogate(text) && text.normalize("NFC") === text;
}

/** Unicode-aware lowercasing (handles accented and non-Latin letters). */
export function toLowercase(text: string): string {
	return text.toLowerCase();
}

/** Decodes UTF-8 bytes, failing on malformed sequences. */
export function decodeUtf8(bytes: Uint8Array): Result<string> {
	try {
		return ok(strictDecoder.decode(bytes));
	} catch (cause) {
		return err("PATH_NOT_NORMALIZABLE", "Bytes are not valid UTF-8.", {
			cause,
		});
	}
}

/**
 * Checks that an archive path is safe to join under an extraction directory.
 *
 * Rejections, in the order they are checked: empty path, backslashes,
 * absolute paths (POSIX or drive-letter), `..` segments, non-NFC text.
 */
export function validateArchivePath(archivePath: string): PathValidation {
	if (archivePath.length === 0) {
		return { valid: false, reason: "Path is empty" };
	}

	if (archivePath.includes("\\")) {
		return { valid: false, reason: "Path contains backslashes" };
	}

	if (isAbsolute(archivePath)) {
		return { valid: false, reason: "Path is absolute" };
	}

	if (splitPath(archivePath).includes("..")) {
		return { valid: false, reason: "Path contains '..' segment" };
	}

	if (!isNFC(archivePath)) {
		return { valid: false, reason: "Path is not NFC-normalized" };
	}

	return { valid: true };
}

/**
 * Converts backslashes to forward slashes, collapses repeated separators and
 * drops trailing separators (a lone `/` is kept).
 */
export function normalizeSeparators(path: string): string {
	const collapsed = path.replace(/[\\/]+/g, "/");
	return collapsed.length > 1 && collapsed.endsWith("/")
		? collapsed.slice(0, -1)
		: collapsed;
}

function joinTwo(base: string, relative: string): string {
	if (base.length === 0) return relative;
	if (relative.length === 0) return base;

	const head = base.endsWith("/") ? base : `${base}/`;
	return head + (relative.startsWith("/") ? relative.slice(1) : relative);
}

/**
 * Joins path segments with `/`, without doubling separators at the seams.
 *
 * @example
 * ```typescript
 * joinPath("variants", "linux-amd64", "lib.so"); // "variants/linux-amd64/lib.so"
 * joinPath(["variants/", "/web"]); // "variants/web"
 * ```
 */
export function joinPath(parts: readonly string[]): string;
export function joinPath(...parts: string[]): string;
export function joinPath(...args: Array<string | readonly string[]>): string {
	return args.flat().reduce(joinTwo, "");
}

/** Last segment of the path. */
export function basename(path: string): string {
	const normalized = normalizeSeparators(path);
	const index = normalized.lastIndexOf("/");
	return index === -1 ? normalized : normalized.slice(index + 1);
}

/** Everything before the last segment; `""` without a separator. */
export function dirname(path: string): string {
	const normalized = normalizeSeparators(path);
	const index = normalized.lastIndexOf("/");
	if (index === -1) return "";
	if (index === 0) return "/";
	return normalized.slice(0, index);
}

/** POSIX absolute paths, plus `C:\` / `C:/` drive-letter paths. */
export function isAbsolute(path: string): boolean {
	return path.startsWith("/") || DRIVE_LETTER.test(path);
}

/** Splits into segments, dropping empty and `.` segments. */
export function splitPath(path: string): string[] {
	return normalizeSeparators(path)
		.split("/")
		.filter((segment) => segment.length > 0 && segment !== ".");
}

/** First segment of the path, e.g. `variants` for `variants/web/index.js`. */
export function getRootComponent(path: string): string {
	return splitPath(path)[0] ?? "";
}

/** Removes leading and trailing forward slashes. */
export function trimSlashes(path: string): string {
	let start = 0;
	let end = path.length;
	while (start < end && path[start] === "/") start++;
	while (end > start && path[end - 1] === "/") end--;
	return path.slice(start, end);
}
