import fc from "fast-check";
import { describe, expect, it } from "vitest";
import { validateChecksum } from "../../src/core/checksum";
import { USTAR } from "../../src/core/constants";
import { LgxError } from "../../src/core/errors";
import {
	createTarEncoder,
	createTarHeader,
	findUstarSplit,
	toTarPath,
} from "../../src/core/pack";
import { readTar } from "../../src/core/unpack";
import { readString } from "../../src/core/utils";

const encoder = new TextEncoder();

function field(block: Uint8Array, name: keyof typeof USTAR): string {
	return readString(block, USTAR[name].offset, USTAR[name].size);
}

function captureError(fn: () => unknown): LgxError {
	try {
		fn();
	} catch (error) {
		if (error instanceof LgxError) return error;
		throw error;
	}
	throw new Error("Expected an LgxError to be thrown");
}

describe("createTarHeader", () => {
	it("writes fixed metadata for a file", () => {
		const header = createTarHeader({ path: "hello.txt", kind: "file", size: 5 });

		expect(header.length).toBe(512);
		expect(field(header, "name")).toBe("hello.txt");
		expect(field(header, "mode")).toBe("0000644");
		expect(field(header, "uid")).toBe("0000000");
		expect(field(header, "gid")).toBe("0000000");
		expect(field(header, "size")).toBe("00000000005");
		expect(field(header, "mtime")).toBe("00000000000");
		expect(field(header, "typeflag")).toBe("0");
		expect(field(header, "linkname")).toBe("");
		expect(field(header, "magic")).toBe("ustar");
		expect(field(header, "version")).toBe("00");
		expect(field(header, "uname")).toBe("");
		expect(field(header, "gname")).toBe("");
		expect(field(header, "devmajor")).toBe("0000000");
		expect(field(header, "devminor")).toBe("0000000");
		expect(field(header, "prefix")).toBe("");
	});

	it("writes directories with mode 0755 and size 0", () => {
		const header = createTarHeader({
			path: "variants/",
			kind: "directory",
			size: 123,
		});

		expect(field(header, "name")).toBe("variants/");
		expect(field(header, "mode")).toBe("0000755");
		expect(field(header, "size")).toBe("00000000000");
		expect(field(header, "typeflag")).toBe("5");
	});

	it("writes the checksum as six octal digits, NUL and space", () => {
		const header = createTarHeader({ path: "a.txt", kind: "file", size: 1 });
		const offset = USTAR.checksum.offset;

		expect(validateChecksum(header)).toBe(true);
		expect(readString(header, offset, 6)).toMatch(/^[0-7]{6}$/);
		expect(header[offset + 6]).toBe(0);
		expect(header[offset + 7]).toBe(0x20);
	});

	it("splits long paths into prefix and name", () => {
		const longPath = `${"a".repeat(120)}/b.txt`;
		const header = createTarHeader({ path: longPath, kind: "file", size: 0 });

		expect(field(header, "prefix")).toBe("a".repeat(120));
		expect(field(header, "name")).toBe("b.txt");
	});

	it("fails when no split point satisfies both limits", () => {
		const cases = [
			"x".repeat(101),
			`${"a".repeat(200)}/b`,
			`p/${"n".repeat(150)}`,
		];

		for (const path of cases) {
			const error = captureError(() =>
				createTarHeader({ path, kind: "file", size: 0 }),
			);
			expect(error.code).toBe("TAR_PATH_TOO_LONG");
			expect(error.kind).toBe("format");
			expect(error.message).toBe(`Path too long for USTAR format: ${path}`);
		}
	});

	it("measures limits in UTF-8 bytes", () => {
		// 61 characters but 121 bytes, so a split is needed.
		const part = "é".repeat(30);
		const header = createTarHeader({
			path: `${part}/${part}`,
			kind: "file",
			size: 0,
		});

		expect(field(header, "prefix")).toBe(part);
		expect(field(header, "name")).toBe(part);
	});
});

describe("findUstarSplit", () => {
	it("never splits at a trailing slash", () => {
		const path = encoder.encode(`${"d".repeat(101)}/`);
		expect(findUstarSplit(path)).toBeNull();
	});

	it("picks the rightmost usable slash", () => {
		const path = encoder.encode(`${"a".repeat(50)}/${"b".repeat(50)}/c.txt`);
		const split = findUstarSplit(path);

		expect(split).not.toBeNull();
		if (split) {
			expect(new TextDecoder().decode(split.prefix)).toBe(
				`${"a".repeat(50)}/${"b".repeat(50)}`,
			);
			expect(new TextDecoder().decode(split.name)).toBe("c.txt");
		}
	});
});

describe("toTarPath", () => {
	it("strips slashes and marks directories", () => {
		expect(toTarPath("/a/b/", "file")).toBe("a/b");
		expect(toTarPath("a/b", "directory")).toBe("a/b/");
		expect(toTarPath("a/b//", "directory")).toBe("a/b/");
	});
});

describe("createTarEncoder", () => {
	it("sorts entries by their byte-wise tar path", () => {
		const tar = createTarEncoder();
		tar.addFile("b.txt", "hello");
		tar.addFile("a/z.txt", "zz");
		tar.addDirectory("a");
		tar.addFile("a-b.txt", "");

		const bytes = tar.finalize();
		const result = readTar(bytes);
		expect(result.ok).toBe(true);
		if (!result.ok) return;

		// '-' (0x2d) sorts before '/' (0x2f).
		expect(result.value.map((entry) => entry.path)).toEqual([
			"a-b.txt",
			"a/",
			"a/z.txt",
			"b.txt",
		]);
	});

	it("pads content to whole blocks and ends with two zero blocks", () => {
		const tar = createTarEncoder();
		tar.addDirectory("a");
		tar.addFile("a/z.txt", "zz");
		tar.addFile("b.txt", "hello");

		const bytes = tar.finalize();

		// Three headers, two content blocks, two end blocks.
		expect(bytes.length).toBe(512 * 7);
		expect(bytes.subarray(512 * 5).every((byte) => byte === 0)).toBe(true);
	});

	it("produces only the end blocks for an empty archive", () => {
		const bytes = createTarEncoder().finalize();
		expect(bytes).toEqual(new Uint8Array(1024));
	});

	it("collapses identical duplicates", () => {
		const tar = createTarEncoder();
		tar.addDirectory("docs/");
		tar.addDirectory("docs");
		tar.addFile("docs/a.txt", "same");
		tar.addFile("/docs/a.txt", "same");

		expect(tar.entryCount()).toBe(4);

		const result = readTar(tar.finalize());
		expect(result.ok && result.value.map((entry) => entry.path)).toEqual([
			"docs/",
			"docs/a.txt",
		]);
	});

	it("rejects conflicting entries for one path", () => {
		const tar = createTarEncoder();
		tar.addFile("a.txt", "one");
		tar.addFile("a.txt", "two");

		const error = captureError(() => tar.finalize());
		expect(error.code).toBe("TAR_DUPLICATE_ENTRY");
		expect(error.entryName).toBe("a.txt");
	});

	it("rejects an entry whose path is only slashes", () => {
		const tar = createTarEncoder();
		tar.addFile("/", "x");

		expect(captureError(() => tar.finalize()).code).toBe("PATH_INVALID");
	});

	it("drops data passed for a directory entry", () => {
		const tar = createTarEncoder();
		tar.addEntry({ path: "d", kind: "directory", data: encoder.encode("x") });

		expect(tar.finalize().length).toBe(512 * 3);
	});

	it("clears entries", () => {
		const tar = createTarEncoder();
		tar.addFile("a.txt", "a");
		tar.clear();

		expect(tar.entryCount()).toBe(0);
		expect(tar.finalize()).toEqual(new Uint8Array(1024));
	});
});

describe("determinism", () => {
	const entriesArbitrary = fc
		.uniqueArray(fc.stringMatching(/^[a-z0-9]{1,12}$/), {
			minLength: 1,
			maxLength: 12,
		})
		.chain((names) =>
			fc.tuple(
				fc.constant(names),
				fc.array(fc.uint8Array({ maxLength: 1200 }), {
					minLength: names.length,
					maxLength: names.length,
				}),
			),
		)
		.map(([names, contents]) =>
			names.map((name, index) => ({ path: `files/${name}`, data: contents[index] })),
		);

	it("ignores insertion order", () => {
		fc.assert(
			fc.property(entriesArbitrary, (entries) => {
				const forward = createTarEncoder();
				for (const entry of entries) forward.addFile(entry.path, entry.data);

				const backward = createTarEncoder();
				for (const entry of [...entries].reverse()) {
					backward.addFile(entry.path, entry.data);
				}

				expect(backward.finalize()).toEqual(forward.finalize());
			}),
			{ numRuns: 50 },
		);
	});

	it("decodes to the same entries", () => {
		fc.assert(
			fc.property(entriesArbitrary, (entries) => {
				const tar = createTarEncoder();
				for (const entry of entries) tar.addFile(entry.path, entry.data);

				const result = readTar(tar.finalize());
				expect(result.ok).toBe(true);
				if (!result.ok) return;

				const decoded = new Map(
					result.value.map((entry) => [entry.path, entry.data]),
				);
				expect(decoded.size).toBe(entries.length);
				for (const entry of entries) {
					expect(decoded.get(entry.path)).toEqual(entry.data);
				}
			}),
			{ numRuns: 50 },
		);
	});
});
