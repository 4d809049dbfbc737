/** Broad category of a failure, used by callers to decide how to report it. */
export type LgxErrorKind = "format" | "validation" | "usage" | "state" | "io";

/** Stable error codes. */
export type LgxErrorCode =
	// Malformed tar/gzip bytes.
	| "TAR_BAD_CHECKSUM"
	| "TAR_TRUNCATED"
	| "TAR_PATH_TOO_LONG"
	| "TAR_DUPLICATE_ENTRY"
	| "TAR_ENTRY_NOT_FOUND"
	| "GZIP_BAD_MAGIC"
	| "GZIP_CORRUPT"
	// Manifest and path problems.
	| "MANIFEST_INVALID_JSON"
	| "MANIFEST_SCHEMA"
	| "MANIFEST_MISSING"
	| "PATH_NOT_NORMALIZABLE"
	| "PATH_INVALID"
	| "VARIANT_INVALID"
	// Caller mistakes.
	| "VARIANT_NOT_FOUND"
	| "MAIN_REQUIRED"
	| "SOURCE_NOT_FOUND"
	| "SOURCE_UNSUPPORTED"
	| "PACKAGE_EXISTS"
	| "PACKAGE_NOT_LOADED"
	| "NOT_IMPLEMENTED"
	| "INVALID_ARGUMENT"
	// Filesystem.
	| "IO_READ"
	| "IO_WRITE";

const KIND_BY_CODE: Record<LgxErrorCode, LgxErrorKind> = {
	TAR_BAD_CHECKSUM: "format",
	TAR_TRUNCATED: "format",
	TAR_PATH_TOO_LONG: "format",
	TAR_DUPLICATE_ENTRY: "format",
	TAR_ENTRY_NOT_FOUND: "format",
	GZIP_BAD_MAGIC: "format",
	GZIP_CORRUPT: "format",
	MANIFEST_INVALID_JSON: "validation",
	MANIFEST_SCHEMA: "validation",
	MANIFEST_MISSING: "validation",
	PATH_NOT_NORMALIZABLE: "validation",
	PATH_INVALID: "validation",
	VARIANT_INVALID: "usage",
	VARIANT_NOT_FOUND: "usage",
	MAIN_REQUIRED: "usage",
	SOURCE_NOT_FOUND: "usage",
	SOURCE_UNSUPPORTED: "usage",
	PACKAGE_EXISTS: "usage",
	PACKAGE_NOT_LOADED: "state",
	NOT_IMPLEMENTED: "usage",
	INVALID_ARGUMENT: "usage",
	IO_READ: "io",
	IO_WRITE: "io",
};

/** Error raised or returned by every lgx operation. */
export class LgxError extends Error {
	/** Machine-readable error code. */
	readonly code: LgxErrorCode;
	/** Category derived from the code. */
	readonly kind: LgxErrorKind;
	/** Archive path or field the error is about, if any. */
	readonly entryName?: string;
	/** Byte offset into the archive the error is about, if any. */
	readonly offset?: number;
	override readonly cause?: unknown;

	constructor(
		code: LgxErrorCode,
		message: string,
		options?: { entryName?: string; offset?: number; cause?: unknown },
	) {
		super(
			message,
			options?.cause !== undefined ? { cause: options.cause } : undefined,
		);
		this.name = "LgxError";
		this.code = code;
		this.kind = KIND_BY_CODE[code];
		this.entryName = options?.entryName;
		this.offset = options?.offset;
		this.cause = options?.cause;
	}

	/** JSON-safe serialization. */
	toJSON(): {
		name: string;
		kind: LgxErrorKind;
		code: LgxErrorCode;
		message: string;
		entryName?: string;
		offset?: number;
	} {
		return {
			name: this.name,
			kind: this.kind,
			code: this.code,
			message: this.message,
			...(this.entryName !== undefined ? { entryName: this.entryName } : {}),
			...(this.offset !== undefined ? { offset: this.offset } : {}),
		};
	}
}

/**
 * Outcome of an operation that can fail. Errors travel in the return value,
 * so concurrent callers never observe each other's failures.
 */
export type Result<T = void> =
	| { ok: true; value: T }
	| { ok: false; error: LgxError };

export function ok<T>(value: T): Result<T> {
	return { ok: true, value };
}

export function err<T = never>(
	code: LgxErrorCode,
	message: string,
	options?: { entryName?: string; offset?: number; cause?: unknown },
): Result<T> {
	return { ok: false, error: new LgxError(code, message, options) };
}

/** Wraps an existing error into a failed {@link Result}. */
export function fail<T = never>(error: LgxError): Result<T> {
	return { ok: false, error };
}

/** Same error with `context: ` in front of the message. */
export function withContext(error: LgxError, context: string): LgxError {
	return new LgxError(error.code, `${context}: ${error.message}`, {
		entryName: error.entryName,
		offset: error.offset,
		cause: error,
	});
}

/** Collected (non-short-circuiting) validation outcome. */
export interface ValidationResult {
	valid: boolean;
	errors: string[];
}

/** Wraps an unknown thrown value into an {@link LgxError}. */
export function toLgxError(
	error: unknown,
	fallback: LgxErrorCode,
	context: string,
): LgxError {
	if (error instanceof LgxError) return error;
	const detail = error instanceof Error ? error.message : String(error);
	return new LgxError(fallback, `${context}: ${detail}`, { cause: error });
}
