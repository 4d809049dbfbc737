import { describe, expect, it } from "vitest";
import { writeChecksum } from "../../src/core/checksum";
import { USTAR } from "../../src/core/constants";
import { createTarEncoder, createTarHeader } from "../../src/core/pack";
import {
	isValidTar,
	iterateTar,
	readTar,
	readTarFile,
	readTarInfo,
} from "../../src/core/unpack";
import { concatBytes, writeOctal, writeString } from "../../src/core/utils";

const decoder = new TextDecoder();
const END = new Uint8Array(1024);

function sampleArchive(): Uint8Array {
	const tar = createTarEncoder();
	tar.addDirectory("a");
	tar.addFile("a/z.txt", "zz");
	tar.addFile("b.txt", "hello");
	return tar.finalize();
}

// A file header for `path`, edited in place and re-checksummed.
function editedHeader(
	path: string,
	edit: (block: Uint8Array) => void,
): Uint8Array {
	const block = createTarHeader({ path, kind: "file", size: 0 });
	edit(block);
	writeChecksum(block);
	return block;
}

function setTypeflag(block: Uint8Array, flag: string): void {
	block[USTAR.typeflag.offset] = flag.length > 0 ? flag.charCodeAt(0) : 0;
}

describe("readTar", () => {
	it("decodes entries with their metadata", () => {
		const result = readTar(sampleArchive());

		expect(result.ok).toBe(true);
		if (!result.ok) return;

		const [dir, nested, file] = result.value;
		expect(result.value).toHaveLength(3);

		expect(dir).toMatchObject({
			path: "a/",
			kind: "directory",
			typeflag: "5",
			mode: 0o755,
			size: 0,
			offset: 0,
		});
		expect(nested).toMatchObject({
			path: "a/z.txt",
			kind: "file",
			size: 2,
			offset: 512,
		});
		expect(file).toMatchObject({
			path: "b.txt",
			kind: "file",
			typeflag: "0",
			mode: 0o644,
			uid: 0,
			gid: 0,
			size: 5,
			mtime: 0,
			linkTarget: "",
			ustar: true,
			offset: 1536,
		});
		expect(decoder.decode(file.data)).toBe("hello");
	});

	it("joins the USTAR prefix back onto the name", () => {
		const path = `${"p".repeat(120)}/${"n".repeat(90)}.txt`;
		const tar = createTarEncoder();
		tar.addFile(path, "x");

		const result = readTar(tar.finalize());
		expect(result.ok && result.value[0].path).toBe(path);
	});

	it("ignores the prefix field without the USTAR magic", () => {
		const header = createTarHeader({
			path: `${"p".repeat(120)}/old.txt`,
			kind: "file",
			size: 0,
		});
		header.fill(0, USTAR.magic.offset, USTAR.version.offset + USTAR.version.size);
		writeChecksum(header);

		const result = readTar(concatBytes([header, END]));
		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value[0].path).toBe("old.txt");
		expect(result.value[0].ustar).toBe(false);
	});

	it("keeps special entries and skips no content for links", () => {
		const symlink = editedHeader("link", (block) => {
			setTypeflag(block, "2");
			writeString(block, USTAR.linkname.offset, USTAR.linkname.size, "b.txt");
			// Links carry no content even when the size field says otherwise.
			writeOctal(block, USTAR.size.offset, USTAR.size.size, 5);
		});
		const hardlink = editedHeader("hard", (block) => {
			setTypeflag(block, "1");
			writeString(block, USTAR.linkname.offset, USTAR.linkname.size, "b.txt");
		});
		const device = editedHeader("dev", (block) => setTypeflag(block, "3"));
		const legacy = editedHeader("legacy.txt", (block) => setTypeflag(block, ""));

		const result = readTar(
			concatBytes([symlink, hardlink, device, legacy, END]),
		);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(
			result.value.map(({ path, kind, typeflag, linkTarget }) => ({
				path,
				kind,
				typeflag,
				linkTarget,
			})),
		).toEqual([
			{ path: "link", kind: "symlink", typeflag: "2", linkTarget: "b.txt" },
			{ path: "hard", kind: "hardlink", typeflag: "1", linkTarget: "b.txt" },
			{ path: "dev", kind: "other", typeflag: "3", linkTarget: "" },
			{ path: "legacy.txt", kind: "file", typeflag: "", linkTarget: "" },
		]);
		expect(result.value[0].data.length).toBe(0);
	});

	it("reports a bad checksum with its offset", () => {
		const bytes = sampleArchive();
		bytes[512] ^= 0x01;

		const result = readTar(bytes);

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("TAR_BAD_CHECKSUM");
		expect(result.error.message).toBe("Invalid checksum at offset 512");
		expect(result.error.offset).toBe(512);
	});

	it("reports an incomplete header", () => {
		const result = readTar(sampleArchive().subarray(0, 612));

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("TAR_TRUNCATED");
		expect(result.error.message).toBe("Incomplete header at offset 512");
	});

	it("reports incomplete file data", () => {
		const tar = createTarEncoder();
		tar.addFile("big.txt", new Uint8Array(1000).fill(7));

		const result = readTar(tar.finalize().subarray(0, 1112));

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("TAR_TRUNCATED");
		expect(result.error.message).toBe("Incomplete file data for big.txt");
		expect(result.error.entryName).toBe("big.txt");
		expect(result.error.offset).toBe(0);
	});

	it("rejects names that are not valid UTF-8", () => {
		const header = editedHeader("x", (block) => {
			block[0] = 0xff;
		});

		const result = readTar(concatBytes([header, END]));

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("PATH_NOT_NORMALIZABLE");
		expect(result.error.message).toBe("Entry name at offset 0 is not valid UTF-8");
	});

	it("stops at the end marker", () => {
		const trailing = new Uint8Array(512).fill(0xff);
		const result = readTar(concatBytes([sampleArchive(), trailing]));

		expect(result.ok && result.value.length).toBe(3);
	});
});

describe("readTarInfo", () => {
	it("returns the entries before a damaged header", () => {
		const bytes = sampleArchive();
		bytes[512] ^= 0x01;

		expect(readTarInfo(bytes).map((info) => info.path)).toEqual(["a/"]);
	});
});

describe("readTarFile", () => {
	it("finds a file ignoring surrounding slashes", () => {
		const result = readTarFile(sampleArchive(), "/b.txt/");
		expect(result.ok && decoder.decode(result.value)).toBe("hello");
	});

	it("does not match directories", () => {
		const result = readTarFile(sampleArchive(), "a");

		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("TAR_ENTRY_NOT_FOUND");
		expect(result.error.message).toBe("File not found: a");
	});

	it("passes format errors through", () => {
		const bytes = sampleArchive();
		bytes[512] ^= 0x01;

		const result = readTarFile(bytes, "b.txt");
		expect(result.ok).toBe(false);
		if (result.ok) return;
		expect(result.error.code).toBe("TAR_BAD_CHECKSUM");
	});
});

describe("iterateTar", () => {
	it("visits every entry in order", () => {
		const seen: string[] = [];
		const result = iterateTar(sampleArchive(), (entry) => {
			seen.push(entry.path);
			return true;
		});

		expect(result).toEqual({ ok: true, value: true });
		expect(seen).toEqual(["a/", "a/z.txt", "b.txt"]);
	});

	it("stops when the visitor returns false", () => {
		const seen: string[] = [];
		const result = iterateTar(sampleArchive(), (entry) => {
			seen.push(entry.path);
			return false;
		});

		expect(result).toEqual({ ok: true, value: false });
		expect(seen).toEqual(["a/"]);
	});
});

describe("isValidTar", () => {
	it("checks the first header block", () => {
		const bytes = sampleArchive();

		expect(isValidTar(bytes)).toBe(true);
		expect(isValidTar(bytes.subarray(0, 511))).toBe(false);
		expect(isValidTar(new Uint8Array(512))).toBe(false);
	});

	it("accepts headers without the USTAR magic", () => {
		const header = editedHeader("plain.txt", (block) => {
			block.fill(0, USTAR.magic.offset, USTAR.magic.offset + USTAR.magic.size);
		});

		expect(isValidTar(header)).toBe(true);
	});
});
