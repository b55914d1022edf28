import { defineProject } from "vitest/config";

export default defineProject({
	test: {
		name: "boardgame-connector",
		globals: true,
		environment: "node",
		include: ["src/**/*.{test,spec}.ts"],
	},
});
