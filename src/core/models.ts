// CHANGE: Domain models for commit validation and tool dispatch
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Exit code of every CI helper.
 *
 * @remarks
 * - 0: every check passed
 * - 1: at least one check failed
 * - 2: the checks could not run (usage error, history query failure)
 */
export type ExitCode = 0 | 1 | 2;

/**
 * One commit read from history. Read-only, discarded after validation.
 */
export interface CommitRecord {
	readonly id: string;
	readonly message: string;
	readonly authorName: string;
	readonly authorEmail: string;
}

/**
 * A single (commit, reason) pair reported by the validator.
 */
export interface CommitFailure {
	readonly commitId: string;
	readonly reason: string;
}

/**
 * Outcome of validating one commit message.
 *
 * @invariant valid ⇔ failures.length = 0
 */
export interface ValidationResult {
	readonly valid: boolean;
	readonly failures: readonly string[];
}

/**
 * Arguments of the formatter run, built once from argv.
 */
export interface FormatArgs {
	readonly startRev: string;
	readonly endRev: string;
	readonly changedFiles: readonly string[];
	readonly pyStyleConfig?: string;
	readonly verbose: boolean;
}

/**
 * Arguments of the type-checking run, built once from argv.
 */
export interface TypingArgs {
	readonly changedFiles: readonly string[];
	readonly verbose: boolean;
}

/**
 * Arguments of the commit-log run.
 */
export interface CommitRangeArgs {
	readonly startRev: string;
	readonly endRev: string;
}

/**
 * External command in argv form (never passed through a shell).
 */
export interface Invocation {
	readonly command: string;
	readonly args: readonly string[];
}

/**
 * Fully captured result of a finished child process.
 */
export interface ProcessOutput {
	readonly exitCode: number;
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Tri-state outcome of dispatching one external tool.
 *
 * - Clean: exit 0, or nothing to check (`skipped`)
 * - NeedsChanges: non-zero exit with a textual diff on stdout
 * - InfrastructureFailure: non-zero exit without output, or the tool never started
 */
export type ToolRunResult = Data.TaggedEnum<{
	Clean: { readonly skipped: boolean; readonly output: string };
	NeedsChanges: { readonly exitCode: number; readonly diff: string };
	InfrastructureFailure: {
		readonly exitCode: number | null;
		readonly reason: string;
	};
}>;

export const ToolRunResult = Data.taggedEnum<ToolRunResult>();

/**
 * Flags the exit code is derived from.
 *
 * @remarks
 * - @pure true
 * - @invariant state is immutable
 */
export interface DecisionState {
	readonly executionFailed: boolean;
	readonly checksFailed: boolean;
}
