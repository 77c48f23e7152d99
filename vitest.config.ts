// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; no test spawns an external process

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				branches: 10,
				functions: 10,
				lines: 10,
				statements: 10,
			},
		},
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
