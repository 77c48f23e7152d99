// CHANGE: Shared shell boundary for the CI helper executables
// FORMAT THEOREM: ∀ program: runMain(program) → process.exit(code) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import type { ExitCode } from "../core/models.js";

/**
 * Runs `program` and terminates the process with its exit code.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition a defect inside `program` is reported and exits with 2
 */
export function runMain(program: Effect.Effect<ExitCode>): void {
	Effect.runFork(
		program.pipe(
			Effect.catchAllDefect((defect) =>
				Effect.sync((): ExitCode => {
					console.error("Fatal error:", defect);
					return 2;
				}),
			),
			Effect.flatMap((code) => Effect.sync(() => process.exit(code))),
		),
	);
}
