import * as path from "node:path";
import { err, ok, type Result } from "../core/errors";
import { validateArchivePath } from "../core/path";

/** Returns true if `targetPath` is `root` or lies beneath it. */
export function isWithin(targetPath: string, root: string): boolean {
	return targetPath === root || targetPath.startsWith(root + path.sep);
}

/**
 * Resolves an archive-relative path under `root`, refusing any path that is
 * unsafe or would land outside `root`.
 *
 * @example
 * ```typescript
 * resolveWithin("/out/web", "dist/index.js"); // ok("/out/web/dist/index.js")
 * resolveWithin("/out/web", "../escape.js"); // error
 * ```
 */
export function resolveWithin(
	root: string,
	archivePath: string,
): Result<string> {
	const validation = validateArchivePath(archivePath);
	if (!validation.valid) {
		return err(
			"PATH_INVALID",
			`Invalid path '${archivePath}': ${validation.reason}`,
			{ entryName: archivePath },
		);
	}

	const resolvedRoot = path.resolve(root);
	const target = path.resolve(resolvedRoot, archivePath);

	if (!isWithin(target, resolvedRoot)) {
		return err(
			"PATH_INVALID",
			`Path traversal attempt detected: "${archivePath}" resolves outside "${resolvedRoot}".`,
			{ entryName: archivePath },
		);
	}

	return ok(target);
}
