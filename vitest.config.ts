import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["apps/bot/tests/**/*.test.ts"],
		environment: "node",
	},
});
