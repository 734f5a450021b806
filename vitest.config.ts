// CHANGE: Vitest configuration for the linecat test suite
// WHY: Tests run from TypeScript sources; no build step before them
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		// NOTE: Tests must import { describe, it, expect } from "vitest"
		globals: false,
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Full coverage for CORE, a floor for the rest
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: lines(f) ≥ 95%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 95,
					lines: 95,
					statements: 95,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
