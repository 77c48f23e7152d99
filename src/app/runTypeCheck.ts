// CHANGE: Orchestrate the Python static typing run
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Probe precedes dispatch; missing tool → 1; no Python files → 0; outcome ≠ Clean → 1
// COMPLEXITY: O(n) where n = |changedFiles|

import { Effect } from "effect";

import { computeExitCode, isClean } from "../core/decision.js";
import { MissingToolError } from "../core/errors.js";
import {
	excludePaths,
	TYPING_EXCLUDED_PATHS,
} from "../core/files/classify.js";
import type { ExitCode, TypingArgs } from "../core/models.js";
import { renderCommandLine } from "../core/tools/invocation.js";
import type { ToolPaths } from "../shell/config/env.js";
import {
	printMissingTool,
	printToolOutcome,
	printTypingFailed,
	printTypingSkipped,
} from "../shell/output/printer.js";
import { makeMypyHelper, probeTool, runTool } from "../shell/tools/index.js";
import { type ProcessRunner, runProcess } from "../shell/utils/exec.js";

/**
 * Type-checks the changed Python files.
 *
 * @pure false (runs mypy, prints the report)
 */
export function runTypeCheck(
	args: TypingArgs,
	paths: ToolPaths,
	runner: ProcessRunner = runProcess,
): Effect.Effect<ExitCode> {
	const helper = makeMypyHelper(paths);
	const changedFiles = excludePaths(args.changedFiles, TYPING_EXCLUDED_PATHS);

	return Effect.gen(function* () {
		const available = yield* probeTool(helper, runner);
		if (!available) {
			return yield* Effect.fail(
				new MissingToolError({
					tool: helper.name,
					command: renderCommandLine(helper.probeInvocation),
				}),
			);
		}

		if (helper.filterFiles(changedFiles).length === 0) {
			printTypingSkipped();
			return computeExitCode({ executionFailed: false, checksFailed: false });
		}

		const outcome = yield* runTool(helper, changedFiles, args, runner);
		printToolOutcome(outcome);
		if (isClean(outcome.result)) {
			return computeExitCode({ executionFailed: false, checksFailed: false });
		}
		printTypingFailed();
		return computeExitCode({ executionFailed: false, checksFailed: true });
	}).pipe(
		Effect.catchTag("MissingToolError", (error) =>
			Effect.sync(() => {
				printMissingTool(error);
				return computeExitCode({ executionFailed: false, checksFailed: true });
			}),
		),
	);
}
