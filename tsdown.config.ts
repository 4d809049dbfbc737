import { defineConfig } from "tsdown";

export default defineConfig([
	{
		entry: {
			index: "./src/core/index.ts",
			fs: "./src/fs/index.ts",
			cli: "./src/cli/cli.ts",
		},
		platform: "node",
		dts: true,
		plugins: [
			{
				name: "strip-tsdoc",
				generateBundle(_options, bundle) {
					for (const [fileName, chunk] of Object.entries(bundle)) {
						if (chunk.type === "chunk" && fileName.endsWith(".js")) {
							chunk.code = chunk.code.replace(
								/\n?\s*\/\*\*[\s\S]*?\*\/\s*\n?/g,
								"\n",
							);
						}
					}
				},
			},
		],
	},
]);
