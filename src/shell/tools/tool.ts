// CHANGE: Capability interface shared by the formatter and type-checker helpers, plus the generic dispatch
// PURITY: SHELL (runs tools, echoes commands and output)
// EFFECT: Effect<ToolOutcome, never>
// INVARIANT: filterFiles(paths) = [] → Clean{skipped} without running anything
// INVARIANT: SpawnError → InfrastructureFailure; the dispatch itself never fails
// COMPLEXITY: O(n) where n = |changedFiles| plus one child process

import { Effect } from "effect";

import type { Invocation, ProcessOutput } from "../../core/models.js";
import { ToolRunResult } from "../../core/models.js";
import {
	forwardOutput,
	printCommand,
	printToolExit,
	type ToolOutcome,
} from "../output/printer.js";
import { type ProcessRunner, probeCommand, runProcess } from "../utils/exec.js";

/**
 * One external tool.
 *
 * @property name Binary name used in reports (`ruff`, `clang-format`, `mypy`)
 * @property friendlyName Human label (`Python code formatter`, ...)
 * @property issueKind Word completing "detected some issues with your code ..."
 * @property forwardStderr `always` or only when verbose
 * @property surfaceCleanOutput Print stdout of a successful run
 */
export interface ToolHelper<A extends { readonly verbose: boolean }> {
	readonly name: string;
	readonly friendlyName: string;
	readonly issueKind: "formatting" | "typing";
	readonly forwardStderr: "always" | "verbose";
	readonly surfaceCleanOutput: boolean;
	readonly filterFiles: (paths: readonly string[]) => readonly string[];
	readonly buildInvocation: (files: readonly string[], args: A) => Invocation;
	readonly interpret: (output: ProcessOutput) => ToolRunResult;
}

/**
 * A tool whose availability is checked before dispatch.
 *
 * @property probeInvocation Cheap call that exits 0 iff the tool is usable
 */
export interface ProbedToolHelper<A extends { readonly verbose: boolean }>
	extends ToolHelper<A> {
	readonly probeInvocation: Invocation;
}

/**
 * Checks that the tool can be started.
 *
 * @effect Effect<boolean, never>
 */
export function probeTool<A extends { readonly verbose: boolean }>(
	helper: ProbedToolHelper<A>,
	runner: ProcessRunner = runProcess,
): Effect.Effect<boolean> {
	return probeCommand(helper.probeInvocation, runner);
}

function echoOutput<A extends { readonly verbose: boolean }>(
	helper: ToolHelper<A>,
	args: A,
	output: ProcessOutput,
): void {
	if (helper.forwardStderr === "always" || args.verbose) {
		forwardOutput(output.stderr);
	}
	if (output.exitCode !== 0) {
		if (args.verbose) printToolExit(helper.name, output.exitCode, output.stdout);
		return;
	}
	if (helper.surfaceCleanOutput) forwardOutput(output.stdout);
}

/**
 * Filters `changedFiles`, runs the tool on what is left and classifies the result.
 *
 * @effect Effect<ToolOutcome, never>
 */
export function runTool<A extends { readonly verbose: boolean }>(
	helper: ToolHelper<A>,
	changedFiles: readonly string[],
	args: A,
	runner: ProcessRunner = runProcess,
): Effect.Effect<ToolOutcome> {
	const describe = (
		invocation: Invocation | null,
		result: ToolRunResult,
	): ToolOutcome => ({
		name: helper.name,
		friendlyName: helper.friendlyName,
		issueKind: helper.issueKind,
		invocation,
		result,
	});

	const files = helper.filterFiles(changedFiles);
	if (files.length === 0) {
		return Effect.succeed(
			describe(null, ToolRunResult.Clean({ skipped: true, output: "" })),
		);
	}

	const invocation = helper.buildInvocation(files, args);
	return Effect.sync(() => {
		if (args.verbose) printCommand(invocation);
	}).pipe(
		Effect.zipRight(runner(invocation)),
		Effect.tap((output) => Effect.sync(() => echoOutput(helper, args, output))),
		Effect.map((output) => describe(invocation, helper.interpret(output))),
		Effect.catchTag("SpawnError", (error) =>
			Effect.succeed(
				describe(
					invocation,
					ToolRunResult.InfrastructureFailure({
						exitCode: null,
						reason: error.detail,
					}),
				),
			),
		),
	);
}
