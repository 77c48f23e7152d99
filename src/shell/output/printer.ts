// CHANGE: Console reporting for commit validation and tool dispatch
// PURITY: SHELL (console output)
// INVARIANT: Every non-Clean outcome prints at least one line naming the tool, commit or check
// COMPLEXITY: O(n) where n = lines printed

import { match } from "ts-pattern";

import type { CommitRunSummary } from "../../core/commit/validate.js";
import type {
	ExecutionError,
	MissingToolError,
	UsageError,
} from "../../core/errors.js";
import type { Invocation, ToolRunResult } from "../../core/models.js";
import { renderCommandLine } from "../../core/tools/invocation.js";

/**
 * What the report needs to know about the tool that produced an outcome.
 */
export interface ToolOutcome {
	readonly name: string;
	readonly friendlyName: string;
	readonly issueKind: "formatting" | "typing";
	readonly invocation: Invocation | null;
	readonly result: ToolRunResult;
}

export function printCommand(invocation: Invocation): void {
	console.log(`Running: ${renderCommandLine(invocation)}`);
}

/**
 * Forwards captured text unchanged (no extra newline).
 */
export function forwardOutput(text: string): void {
	if (text.length > 0) process.stdout.write(text);
}

export function printToolExit(
	name: string,
	exitCode: number,
	stdout: string,
): void {
	console.log(`error: ${name} exited with code ${String(exitCode)}`);
	console.log(stdout);
}

/**
 * Prints the warning for a non-Clean outcome; Clean prints nothing.
 */
export function printToolOutcome(outcome: ToolOutcome): void {
	match(outcome.result)
		.with({ _tag: "Clean" }, () => undefined)
		.with({ _tag: "NeedsChanges" }, () => {
			console.log(
				`Warning: ${outcome.friendlyName}, ${outcome.name} detected some issues with your code ${outcome.issueKind}...`,
			);
			if (outcome.invocation !== null) {
				console.log(
					`   ↳ Reproduce locally: ${renderCommandLine(outcome.invocation)}`,
				);
			}
		})
		.with({ _tag: "InfrastructureFailure" }, ({ reason }) => {
			console.log(
				`Warning: The ${outcome.friendlyName} failed without printing a diff. Check the logs for stderr output. ⚠️`,
			);
			console.log(`   ↳ ${outcome.name}: ${reason}`);
		})
		.exhaustive();
}

export function printFailedFormatters(names: readonly string[]): void {
	console.log(`error: some formatters failed: ${names.join(" ")}`);
}

export function printTypingSkipped(): void {
	console.log("No python files changed, skipping static typing...");
}

export function printTypingFailed(): void {
	console.log("error: static typing for python failed");
}

export function printMissingTool(error: MissingToolError): void {
	console.error(`error: ${error.tool} is not installed or not found in PATH`);
	console.error(`   ↳ Probe: ${error.command}`);
}

export function printUnreadableCommit(commitId: string): void {
	console.error(`Could not get log for commit ${commitId}`);
}

export function printExecutionError(error: ExecutionError): void {
	console.error(`Error getting commit history: ${error.detail}`);
	console.error(`   ↳ Command: ${error.command}`);
}

export function printUsageError(error: UsageError, usage: string): void {
	console.error(usage);
	console.error(`error: ${error.detail}`);
}

/**
 * Prints every (commit, reason) pair, or the all-clear line.
 */
export function printCommitSummary(summary: CommitRunSummary): void {
	if (summary.failingCommits === 0) {
		console.log("✅ All commits match the template!");
		return;
	}
	console.log(
		`❌ Found ${String(summary.failingCommits)} commit(s) that don't match the template:`,
	);
	for (const failure of summary.failures) {
		console.log(`- Commit ${failure.commitId}: ${failure.reason}`);
	}
}
