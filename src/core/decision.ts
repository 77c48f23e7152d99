// CHANGE: Pure decision function mapping run state to a process exit code
// FORMAT THEOREM: ∀s: s.executionFailed → 2; ¬s.executionFailed ∧ s.checksFailed → 1; otherwise 0
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode, ToolRunResult } from "./models.js";

/**
 * Computes the process exit code from run state.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1,2}
 *
 * @example
 * ```ts
 * computeExitCode({ executionFailed: false, checksFailed: true }); // 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(state, (s): ExitCode => {
		if (s.executionFailed) return 2;
		return s.checksFailed ? 1 : 0;
	});

/**
 * True when the outcome does not fail the run.
 *
 * @pure true
 */
export const isClean = (result: ToolRunResult): boolean =>
	result._tag === "Clean";

/**
 * Names of the tools whose outcome is not Clean, in dispatch order.
 *
 * @pure true
 * @complexity O(n)
 */
export function failedToolNames(
	outcomes: ReadonlyArray<{
		readonly name: string;
		readonly result: ToolRunResult;
	}>,
): readonly string[] {
	return outcomes.filter((o) => !isClean(o.result)).map((o) => o.name);
}
