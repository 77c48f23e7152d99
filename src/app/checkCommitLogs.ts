// CHANGE: Orchestrate commit-message validation over a revision range
// PURITY: APP (no process.exit; composes SHELL git queries with CORE validation)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: history failure → 2; unreadable commit → 1; any invalid commit → 1; otherwise 0
// COMPLEXITY: O(n·m) where n = commits, m = message lines

import { Effect } from "effect";

import {
	summarizeCommits,
	validateCommitRecord,
} from "../core/commit/validate.js";
import { computeExitCode } from "../core/decision.js";
import type {
	CommitRangeArgs,
	ExitCode,
	ValidationResult,
} from "../core/models.js";
import { listCommitIds, readCommitRecord } from "../shell/git/history.js";
import {
	printCommitSummary,
	printExecutionError,
	printUnreadableCommit,
} from "../shell/output/printer.js";
import { type ProcessRunner, runProcess } from "../shell/utils/exec.js";

/**
 * Validates every commit in `startRev..endRev`, one at a time.
 *
 * @returns Effect<ExitCode, never>
 * @pure false (runs git, prints the report)
 */
export function checkCommitLogs(
	args: CommitRangeArgs,
	runner: ProcessRunner = runProcess,
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const ids = yield* listCommitIds(args.startRev, args.endRev, runner);
		const results: { commitId: string; result: ValidationResult }[] = [];

		for (const commitId of ids) {
			const record = yield* readCommitRecord(commitId, runner);
			if (record === null) {
				printUnreadableCommit(commitId);
				return computeExitCode({ executionFailed: false, checksFailed: true });
			}
			results.push({ commitId, result: validateCommitRecord(record) });
		}

		const summary = summarizeCommits(results);
		printCommitSummary(summary);
		return computeExitCode({
			executionFailed: false,
			checksFailed: summary.failingCommits > 0,
		});
	}).pipe(
		Effect.catchTag("ExecutionError", (error) =>
			Effect.sync(() => {
				printExecutionError(error);
				return computeExitCode({ executionFailed: true, checksFailed: false });
			}),
		),
	);
}
