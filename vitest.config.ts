// CHANGE: Vitest configuration for the analysis engine
// WHY: Native ESM, explicit imports, property-based tests via fast-check
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects
// COMPLEXITY: O(n) test execution where n = |test_files|

import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CORE is pure and held to a higher bar than SHELL
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 80,
					functions: 90,
					lines: 90,
					statements: 90,
				},
			},
		},

		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
