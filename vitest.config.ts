import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@lazyschema/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
			"@lazyschema/schema": fileURLToPath(new URL("./packages/schema/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		environment: "node",
	},
});
