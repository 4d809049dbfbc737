import { describe, expect, it } from "vitest";
import {
	CURRENT_MANIFEST_VERSION,
	Manifest,
	type ManifestData,
} from "../../src/core/manifest";

function manifestData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	const base: ManifestData = {
		manifestVersion: "0.1.0",
		name: "demo",
		version: "1.2.3",
		description: "A demo package",
		author: "Test Author",
		type: "app",
		category: "tools",
		icon: "icon.png",
		dependencies: [],
		main: { web: "index.html" },
	};
	return { ...base, ...overrides };
}

function without(field: string): Record<string, unknown> {
	const data = manifestData();
	delete data[field];
	return data;
}

function parseError(json: string): { code: string; message: string } {
	const result = Manifest.parse(json);
	if (result.ok) throw new Error("Expected the manifest to be rejected");
	return { code: result.error.code, message: result.error.message };
}

describe("Manifest.parse", () => {
	it("reads every field", () => {
		const result = Manifest.parse(
			JSON.stringify(manifestData({ dependencies: ["base"] })),
		);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.toData()).toEqual(
			manifestData({ dependencies: ["base"] }),
		);
	});

	it("lowercases variant keys", () => {
		const result = Manifest.parse(
			JSON.stringify(manifestData({ main: { WEB: "index.html", Cli: "run" } })),
		);

		expect(result.ok).toBe(true);
		if (!result.ok) return;
		expect(result.value.main).toEqual({ cli: "run", web: "index.html" });
		expect(result.value.getVariants()).toEqual(["cli", "web"]);
	});

	it("ignores unknown fields", () => {
		const result = Manifest.parse(
			JSON.stringify(manifestData({ homepage: "https://example.com" })),
		);
		expect(result.ok).toBe(true);
	});

	it("rejects malformed JSON", () => {
		const error = parseError("{ not json");

		expect(error.code).toBe("MANIFEST_INVALID_JSON");
		expect(error.message.startsWith("JSON parse error: ")).toBe(true);
	});

	it.each([
		["[]", "Manifest must be a JSON object"],
		["\"text\"", "Manifest must be a JSON object"],
		[JSON.stringify(without("name")), "Missing or invalid 'name' field"],
		[JSON.stringify(manifestData({ name: 5 })), "Missing or invalid 'name' field"],
		[JSON.stringify(without("icon")), "Missing or invalid 'icon' field"],
		[
			JSON.stringify(manifestData({ dependencies: "base" })),
			"Missing or invalid 'dependencies' field",
		],
		[
			JSON.stringify(manifestData({ dependencies: ["base", 1] })),
			"Invalid dependency entry (not a string)",
		],
		[
			JSON.stringify(manifestData({ main: ["index.html"] })),
			"Missing or invalid 'main' field",
		],
		[
			JSON.stringify(manifestData({ main: { Web: 3 } })),
			"Invalid main entry for 'Web' (not a string)",
		],
		[
			JSON.stringify(manifestData({ main: { "a/b": null } })),
			"Invalid main entry for 'a/b' (not a string)",
		],
	])("rejects %s", (json, message) => {
		expect(parseError(json)).toEqual({ code: "MANIFEST_SCHEMA", message });
	});

	it("reports the earliest field when several are wrong", () => {
		const data = manifestData({ icon: 1, main: "x" });
		delete data.version;

		expect(parseError(JSON.stringify(data)).message).toBe(
			"Missing or invalid 'version' field",
		);
	});
});

describe("Manifest.skeleton", () => {
	it("serializes in canonical form", () => {
		expect(Manifest.skeleton("MyPkg").serialize()).toBe(
			[
				"{",
				'  "manifestVersion": "0.1.0",',
				'  "name": "mypkg",',
				'  "version": "0.0.1",',
				'  "description": "",',
				'  "author": "",',
				'  "type": "",',
				'  "category": "",',
				'  "icon": "",',
				'  "dependencies": [],',
				'  "main": {}',
				"}",
			].join("\n"),
		);
	});
});

describe("serialize", () => {
	it("sorts main keys and keeps the field order", () => {
		const manifest = new Manifest({ name: "demo", version: "1.0.0" });
		manifest.dependencies.push("base");
		manifest.setMain("web", "index.html");
		manifest.setMain("cli", "bin/run");

		expect(manifest.serialize()).toBe(
			[
				"{",
				`  "manifestVersion": "${CURRENT_MANIFEST_VERSION}",`,
				'  "name": "demo",',
				'  "version": "1.0.0",',
				'  "description": "",',
				'  "author": "",',
				'  "type": "",',
				'  "category": "",',
				'  "icon": "",',
				'  "dependencies": [',
				'    "base"',
				"  ],",
				'  "main": {',
				'    "cli": "bin/run",',
				'    "web": "index.html"',
				"  }",
				"}",
			].join("\n"),
		);
	});

	it("orders integer-like main keys by code unit", () => {
		const manifest = new Manifest({ name: "demo", version: "1.0.0" });
		manifest.setMain("a", "a.js");
		manifest.setMain("9", "nine.js");
		manifest.setMain("10", "ten.js");

		expect(manifest.serialize().split("\n").slice(-6)).toEqual([
			'  "main": {',
			'    "10": "ten.js",',
			'    "9": "nine.js",',
			'    "a": "a.js"',
			"  }",
			"}",
		]);
		expect(manifest.sortedMain().map(([key]) => key)).toEqual(["10", "9", "a"]);
	});

	it("parses back to the same text", () => {
		const text = Manifest.parse(JSON.stringify(manifestData()));
		expect(text.ok).toBe(true);
		if (!text.ok) return;

		const again = Manifest.parse(text.value.serialize());
		expect(again.ok && again.value.serialize()).toBe(text.value.serialize());
	});
});

describe("isVersionSupported", () => {
	it.each([
		["0.1.0", true],
		["0.9", true],
		["1.0.0", false],
		["0", false],
		["00.1", false],
		["", false],
	])("%s -> %s", (version, expected) => {
		expect(Manifest.isVersionSupported(version)).toBe(expected);
	});
});

describe("validateFields", () => {
	it("accepts a complete manifest", () => {
		const result = Manifest.parse(JSON.stringify(manifestData()));
		expect(result.ok && result.value.validateFields()).toEqual({
			valid: true,
			errors: [],
		});
	});

	it("collects every problem", () => {
		const manifest = new Manifest({
			manifestVersion: "1.0.0",
			main: { Web: "../x" },
		});

		expect(manifest.validateFields()).toEqual({
			valid: false,
			errors: [
				"Unsupported manifest version: 1.0.0",
				"'name' field is empty",
				"'version' field is empty",
				"Variant key 'Web' is not lowercase",
				"Invalid main path for 'Web': Path contains '..' segment",
			],
		});
	});
});

describe("validateCompleteness", () => {
	it("reports mismatches in both directions", () => {
		const manifest = new Manifest({
			main: { web: "index.html", cli: "run" },
		});

		expect(manifest.validateCompleteness(["WEB", "docs"])).toEqual({
			valid: false,
			errors: [
				"main[cli] has no corresponding variant directory",
				"Variant 'docs' has no main entry",
			],
		});
	});

	it("passes when both sides agree", () => {
		const manifest = new Manifest({ main: { web: "index.html" } });
		expect(manifest.validateCompleteness(["web"]).valid).toBe(true);
	});
});

describe("main entries", () => {
	it("are case-insensitive", () => {
		const manifest = new Manifest();
		manifest.setMain("Linux-AMD64", "bin/app");

		expect(manifest.getMain("linux-amd64")).toBe("bin/app");
		expect(manifest.getMain("LINUX-amd64")).toBe("bin/app");
		expect(manifest.main).toEqual({ "linux-amd64": "bin/app" });

		manifest.removeMain("LINUX-AMD64");
		expect(manifest.getVariants()).toEqual([]);
	});

	it("replaces an entry that differs only in case", () => {
		const manifest = new Manifest();
		manifest.setMain("web", "old.html");
		manifest.setMain("WEB", "new.html");

		expect(manifest.main).toEqual({ web: "new.html" });
	});

	it("lowercases non-ASCII keys", () => {
		const manifest = new Manifest();
		manifest.setMain("ÄRGER", "a");

		expect(manifest.getVariants()).toEqual(["ärger"]);
	});

	it("normalizes keys given to the constructor on request", () => {
		const manifest = new Manifest({ main: { Web: "index.html" } });
		expect(Object.keys(manifest.main)).toEqual(["Web"]);

		manifest.normalizeVariantKeys();
		expect(Object.keys(manifest.main)).toEqual(["web"]);
	});
});

describe("clone", () => {
	it("is independent of the original", () => {
		const original = Manifest.skeleton("demo");
		original.setMain("web", "index.html");

		const copy = original.clone();
		copy.setMain("cli", "run");
		copy.dependencies.push("extra");

		expect(original.getVariants()).toEqual(["web"]);
		expect(original.dependencies).toEqual([]);
	});
});

describe("normalizeName", () => {
	it("lowercases the name", () => {
		const manifest = new Manifest({ name: "MyPackage" });
		manifest.normalizeName();
		expect(manifest.name).toBe("mypackage");
	});
});
