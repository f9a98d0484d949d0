import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// config tests chdir into temp directories, which worker threads do not allow
		pool: "forks",
		testTimeout: 10000,
	},
})
