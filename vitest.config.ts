import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/**/*.test.ts"],
		// config tests chdir into temp dirs, which worker threads do not allow
		pool: "forks",
	},
})
