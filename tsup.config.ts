import { defineConfig } from "tsup";

export default defineConfig({
	entry: ["src/index.ts"],
	format: ["cjs", "esm"],
	dts: true,
	clean: true,
	sourcemap: true,
	// @lydell/node-pty ships native binaries and must stay external
	external: ["@lydell/node-pty"],
});
