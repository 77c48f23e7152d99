import { describe, expect, it } from "vitest";

import {
	DEFAULT_TOOL_PATHS,
	loadToolPaths,
} from "../../../src/shell/config/env.js";

describe("loadToolPaths", () => {
	it("uses the documented defaults", () => {
		expect(loadToolPaths({})).toEqual({
			clangFormat: "git-clang-format",
			ruff: "ruff",
			mypy: "mypy",
		});
	});

	it("reads each override from its own variable", () => {
		expect(
			loadToolPaths({
				CLANG_FORMAT_PATH: "/opt/llvm/bin/git-clang-format",
				RUFF_FORMAT_PATH: "/opt/ruff",
				MYPY_PATH: "/venv/bin/mypy",
			}),
		).toEqual({
			clangFormat: "/opt/llvm/bin/git-clang-format",
			ruff: "/opt/ruff",
			mypy: "/venv/bin/mypy",
		});
	});

	it("falls back to the default for empty values", () => {
		expect(loadToolPaths({ RUFF_FORMAT_PATH: "" }).ruff).toBe(
			DEFAULT_TOOL_PATHS.ruff,
		);
	});
});
