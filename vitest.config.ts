import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["http/src/**/*.test.ts"],
		environment: "node",
	},
});
