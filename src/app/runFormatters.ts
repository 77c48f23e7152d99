// CHANGE: Orchestrate the formatter run (ruff, then git-clang-format)
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Tools run sequentially in fixed order; one tool's failure never stops the next
// INVARIANT: exit 1 ⇔ ∃ outcome ≠ Clean
// COMPLEXITY: O(n) where n = |changedFiles|, plus one child process per non-empty bucket

import { Effect } from "effect";

import { computeExitCode, failedToolNames } from "../core/decision.js";
import type { ExitCode, FormatArgs } from "../core/models.js";
import type { ToolPaths } from "../shell/config/env.js";
import {
	printFailedFormatters,
	printToolOutcome,
	type ToolOutcome,
} from "../shell/output/printer.js";
import {
	makeClangFormatHelper,
	makeRuffHelper,
	runTool,
	type ToolHelper,
} from "../shell/tools/index.js";
import { type ProcessRunner, runProcess } from "../shell/utils/exec.js";

/**
 * Formatters in dispatch order.
 *
 * @pure true
 */
export const formatHelpers = (
	paths: ToolPaths,
): readonly ToolHelper<FormatArgs>[] => [
	makeRuffHelper(paths),
	makeClangFormatHelper(paths),
];

/**
 * Runs every formatter over the changed files and aggregates the outcomes.
 *
 * @pure false (runs tools, prints the report)
 */
export function runFormatters(
	args: FormatArgs,
	paths: ToolPaths,
	runner: ProcessRunner = runProcess,
): Effect.Effect<ExitCode> {
	return Effect.forEach(formatHelpers(paths), (helper) =>
		runTool(helper, args.changedFiles, args, runner).pipe(
			Effect.tap((outcome: ToolOutcome) =>
				Effect.sync(() => printToolOutcome(outcome)),
			),
		),
	).pipe(
		Effect.map((outcomes) => {
			const failed = failedToolNames(outcomes);
			if (failed.length > 0) printFailedFormatters(failed);
			return computeExitCode({
				executionFailed: false,
				checksFailed: failed.length > 0,
			});
		}),
	);
}
