// CHANGE: Exit-code decision table
// PURITY: CORE
// INVARIANT: exitCode ∈ {0,1,2}

import { describe, expect, it } from "vitest";

import {
	computeExitCode,
	failedToolNames,
	isClean,
} from "../../src/core/decision.js";
import { ToolRunResult } from "../../src/core/models.js";

describe("computeExitCode", () => {
	it("returns 0 when everything passed", () => {
		expect(computeExitCode({ executionFailed: false, checksFailed: false })).toBe(0);
	});

	it("returns 1 when a check failed", () => {
		expect(computeExitCode({ executionFailed: false, checksFailed: true })).toBe(1);
	});

	it("returns 2 when the checks could not run, whatever else happened", () => {
		expect(computeExitCode({ executionFailed: true, checksFailed: false })).toBe(2);
		expect(computeExitCode({ executionFailed: true, checksFailed: true })).toBe(2);
	});
});

describe("failedToolNames", () => {
	it("lists non-Clean tools in dispatch order", () => {
		expect(
			failedToolNames([
				{
					name: "ruff",
					result: ToolRunResult.InfrastructureFailure({
						exitCode: 2,
						reason: "x",
					}),
				},
				{
					name: "skipped",
					result: ToolRunResult.Clean({ skipped: true, output: "" }),
				},
				{
					name: "clang-format",
					result: ToolRunResult.NeedsChanges({ exitCode: 1, diff: "d" }),
				},
			]),
		).toEqual(["ruff", "clang-format"]);
	});

	it("isClean is true only for Clean", () => {
		expect(isClean(ToolRunResult.Clean({ skipped: false, output: "" }))).toBe(
			true,
		);
		expect(
			isClean(ToolRunResult.NeedsChanges({ exitCode: 1, diff: "d" })),
		).toBe(false);
	});
});
