// CHANGE: Tests for report wording of tool outcomes and commit summaries
// INVARIANT: NeedsChanges and InfrastructureFailure print different warnings; Clean prints nothing

import { afterEach, describe, expect, it, vi } from "vitest";

import { ToolRunResult } from "../../../src/core/models.js";
import {
	printCommitSummary,
	printToolOutcome,
	type ToolOutcome,
} from "../../../src/shell/output/printer.js";
import { captureOutput } from "../../utils/fakeRunner.js";

const outcome = (result: ToolRunResult): ToolOutcome => ({
	name: "ruff",
	friendlyName: "Python code formatter",
	issueKind: "formatting",
	invocation: { command: "ruff", args: ["format", "--check", "--diff", "--", "a.py"] },
	result,
});

afterEach((): void => {
	vi.restoreAllMocks();
});

describe("printToolOutcome", () => {
	it("prints nothing for Clean", () => {
		const out = captureOutput();
		printToolOutcome(outcome(ToolRunResult.Clean({ skipped: false, output: "" })));
		expect(out.log).not.toHaveBeenCalled();
	});

	it("prints the formatting warning and how to reproduce it", () => {
		const out = captureOutput();
		printToolOutcome(
			outcome(ToolRunResult.NeedsChanges({ exitCode: 1, diff: "--- a.py\n" })),
		);
		expect(out.logLines()).toEqual([
			"Warning: Python code formatter, ruff detected some issues with your code formatting...",
			"   ↳ Reproduce locally: ruff format --check --diff -- a.py",
		]);
	});

	it("prints a distinct warning when no diff was produced", () => {
		const out = captureOutput();
		printToolOutcome(
			outcome(
				ToolRunResult.InfrastructureFailure({
					exitCode: 2,
					reason: "exited with code 2 without output",
				}),
			),
		);
		expect(out.logLines()).toEqual([
			"Warning: The Python code formatter failed without printing a diff. Check the logs for stderr output. ⚠️",
			"   ↳ ruff: exited with code 2 without output",
		]);
	});
});

describe("printCommitSummary", () => {
	it("prints the all-clear line", () => {
		const out = captureOutput();
		printCommitSummary({ checkedCommits: 2, failingCommits: 0, failures: [] });
		expect(out.logLines()).toEqual(["✅ All commits match the template!"]);
	});

	it("prints every commit/reason pair", () => {
		const out = captureOutput();
		printCommitSummary({
			checkedCommits: 3,
			failingCommits: 1,
			failures: [
				{ commitId: "c2", reason: "Missing 'Test:' section" },
				{ commitId: "c2", reason: "Missing 'JIRA:' section" },
			],
		});
		expect(out.logLines()).toEqual([
			"❌ Found 1 commit(s) that don't match the template:",
			"- Commit c2: Missing 'Test:' section",
			"- Commit c2: Missing 'JIRA:' section",
		]);
	});
});
