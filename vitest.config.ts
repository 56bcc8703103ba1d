// CHANGE: Vitest configuration for the format gate
// WHY: Native ESM, explicit imports, tests under test/ mirroring src/
// INVARIANT: Deterministic test execution without shared mutable state

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		// Formatter stand-ins are real processes; leave headroom on slow CI
		testTimeout: 20_000,
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
