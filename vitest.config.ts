// CHANGE: Vitest configuration for commit-range
// WHY: Native ESM, explicit imports (globals: false), tests under test/
// INVARIANT: Deterministic test execution without side effects
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: 100% line/function coverage for CORE
		// NOTE: branches are not pinned; planRange keeps index guards that noUncheckedIndexedAccess requires
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					functions: 100,
					lines: 100,
					statements: 100,
				},
			},
		},

		// CHANGE: Clear mocks between tests
		// INVARIANT: ∀ test_i, test_j: independent(test_i, test_j) ⇒ no_shared_state
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
