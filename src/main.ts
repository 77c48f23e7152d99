// CHANGE: Thin APP delegators from argv to each CI helper
// PURITY: APP (no process.exit; only composition)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: --help → 0; UsageError → 2; otherwise the helper's own exit code
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { checkCommitLogs } from "./app/checkCommitLogs.js";
import { runFormatters } from "./app/runFormatters.js";
import { runTypeCheck } from "./app/runTypeCheck.js";
import type { UsageError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import {
	CHECK_COMMIT_LOGS_SPEC,
	type CliRequest,
	type CommandSpec,
	FORMAT_HELPER_SPEC,
	parseCheckCommitLogsArgs,
	parseFormatHelperArgs,
	parseTypingHelperArgs,
	renderUsage,
	TYPING_HELPER_SPEC,
} from "./shell/config/cli.js";
import { loadToolPaths } from "./shell/config/env.js";
import { printUsageError } from "./shell/output/printer.js";
import { type ProcessRunner, runProcess } from "./shell/utils/exec.js";

function runRequest<A>(
	spec: CommandSpec,
	request: Effect.Effect<CliRequest<A>, UsageError>,
	run: (args: A) => Effect.Effect<ExitCode>,
): Effect.Effect<ExitCode> {
	return request.pipe(
		Effect.flatMap((req) =>
			req._tag === "Help"
				? Effect.sync((): ExitCode => {
						console.log(req.usage);
						return 0;
					})
				: run(req.args),
		),
		Effect.catchTag("UsageError", (error) =>
			Effect.sync((): ExitCode => {
				printUsageError(error, renderUsage(spec));
				return 2;
			}),
		),
	);
}

/**
 * `ci-check-commit-logs --start-rev <rev> --end-rev <rev>`
 *
 * @returns ExitCode (0 | 1 | 2)
 */
export function checkCommitLogsMain(
	argv: readonly string[] = process.argv.slice(2),
	runner: ProcessRunner = runProcess,
): Effect.Effect<ExitCode> {
	return runRequest(
		CHECK_COMMIT_LOGS_SPEC,
		parseCheckCommitLogsArgs(argv),
		(args) => checkCommitLogs(args, runner),
	);
}

/**
 * `ci-format-helper --start-rev <rev> --end-rev <rev> --changed-files <files> --py-style-config <path>`
 */
export function formatHelperMain(
	argv: readonly string[] = process.argv.slice(2),
	env: NodeJS.ProcessEnv = process.env,
	runner: ProcessRunner = runProcess,
): Effect.Effect<ExitCode> {
	return runRequest(FORMAT_HELPER_SPEC, parseFormatHelperArgs(argv), (args) =>
		runFormatters(args, loadToolPaths(env), runner),
	);
}

/**
 * `ci-typing-helper --changed-files <files>`
 */
export function typingHelperMain(
	argv: readonly string[] = process.argv.slice(2),
	env: NodeJS.ProcessEnv = process.env,
	runner: ProcessRunner = runProcess,
): Effect.Effect<ExitCode> {
	return runRequest(TYPING_HELPER_SPEC, parseTypingHelperArgs(argv), (args) =>
		runTypeCheck(args, loadToolPaths(env), runner),
	);
}
