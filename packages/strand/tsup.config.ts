import { defineConfig } from "tsup"

export default defineConfig({
	banner: { js: "#!/usr/bin/env node" },
	clean: true,
	entry: ["src/cli.ts"],
	format: ["esm"],
	// The workspace core package ships TypeScript sources, so it is bundled in.
	noExternal: ["@strand/core"],
	target: "node20",
	treeshake: true,
	tsconfig: "../../tsconfig.json",
})
