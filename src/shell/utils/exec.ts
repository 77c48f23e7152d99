// CHANGE: Run external commands as argv arrays with full stdout/stderr capture
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<ProcessOutput, SpawnError>
// INVARIANT: ∀ invocation: started process → ProcessOutput (any exit code); not started → SpawnError
// COMPLEXITY: O(n) space where n = captured output length

import {
	type ExecFileOptionsWithStringEncoding,
	execFile,
} from "node:child_process";
import { promisify } from "node:util";
import { Effect } from "effect";

import { SpawnError } from "../../core/errors.js";
import type { Invocation, ProcessOutput } from "../../core/models.js";
import { renderCommandLine } from "../../core/tools/invocation.js";

const execFileAsync = promisify(execFile);

/**
 * Options for every child: UTF-8 text, no cap on captured output, killed
 * when `signal` aborts.
 *
 * @pure true
 */
export const captureOptions = (
	signal: AbortSignal,
): ExecFileOptionsWithStringEncoding => ({
	encoding: "utf8",
	maxBuffer: Number.POSITIVE_INFINITY,
	signal,
});

/**
 * Runs one invocation to completion.
 *
 * Injected everywhere a child process is needed so tests can substitute an
 * in-process fake.
 */
export type ProcessRunner = (
	invocation: Invocation,
) => Effect.Effect<ProcessOutput, SpawnError>;

/**
 * Recovers the captured output of a process that ran but exited non-zero.
 *
 * @returns ProcessOutput, or null when the error does not describe an exit
 * @pure true
 */
export function exitOutputFromError(error: Error): ProcessOutput | null {
	if (!("code" in error) || typeof error.code !== "number") return null;
	const stdout =
		"stdout" in error && typeof error.stdout === "string" ? error.stdout : "";
	const stderr =
		"stderr" in error && typeof error.stderr === "string" ? error.stderr : "";
	return { exitCode: error.code, stdout, stderr };
}

/**
 * Executes `invocation` without a shell and waits for it to exit.
 *
 * The child is bound to the fiber through an AbortSignal: interrupting the
 * effect kills the process, so no handle outlives the effect. No timeout is
 * applied; a tool that never exits blocks the run.
 *
 * @effect Effect<ProcessOutput, SpawnError>
 */
export const runProcess: ProcessRunner = (invocation) =>
	Effect.tryPromise({
		try: (signal) =>
			execFileAsync(
				invocation.command,
				[...invocation.args],
				captureOptions(signal),
			),
		catch: (error) =>
			error instanceof Error ? error : new Error(String(error)),
	}).pipe(
		Effect.map(
			({ stdout, stderr }): ProcessOutput => ({ exitCode: 0, stdout, stderr }),
		),
		Effect.catchAll((error) => {
			const output = exitOutputFromError(error);
			if (output !== null) return Effect.succeed(output);
			return Effect.fail(
				new SpawnError({
					command: renderCommandLine(invocation),
					detail: error.message,
				}),
			);
		}),
	);

/**
 * Runs an availability probe (`--version`, `-h`).
 *
 * @returns true iff the tool started and exited 0
 * @effect Effect<boolean, never>
 */
export function probeCommand(
	invocation: Invocation,
	runner: ProcessRunner = runProcess,
): Effect.Effect<boolean> {
	return runner(invocation).pipe(
		Effect.map((output) => output.exitCode === 0),
		Effect.catchAll(() => Effect.succeed(false)),
	);
}
