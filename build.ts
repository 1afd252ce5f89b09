import { build } from "esbuild";

await build({
	entryPoints: ["./src/index.ts"],
	bundle: true,
	minify: true,
	platform: "node",
	target: "node20",
	outfile: "./build/server.js",
	format: "esm",
	banner: {
		js: `import { createRequire } from 'module';
const require = createRequire(import.meta.url);`,
	},
	resolveExtensions: [".ts", ".js", ".json"],
});
