// CHANGE: Pure construction of external tool command lines and classification of their results
// PURITY: CORE
// INVARIANT: Invocations are argv arrays; files always follow a `--` separator where the tool accepts one
// COMPLEXITY: O(n) where n = |files|

import { collectExtensions } from "../files/classify.js";
import type { Invocation, ProcessOutput } from "../models.js";
import { ToolRunResult } from "../models.js";

/**
 * `git-clang-format --diff [start end] --extensions <exts> -- <files>`
 *
 * The distinct extensions of `files` are passed explicitly so that
 * git-clang-format does not apply a second filter of its own.
 *
 * @pure true
 */
export function buildClangFormatInvocation(
	command: string,
	files: readonly string[],
	range: { readonly startRev: string; readonly endRev: string },
): Invocation {
	const revisions =
		range.startRev.length > 0 && range.endRev.length > 0
			? [range.startRev, range.endRev]
			: [];
	return {
		command,
		args: [
			"--diff",
			...revisions,
			"--extensions",
			collectExtensions(files).join(","),
			"--",
			...files,
		],
	};
}

/**
 * `ruff format --check --diff [--config <cfg>] -- <files>`
 *
 * @pure true
 */
export function buildRuffInvocation(
	command: string,
	files: readonly string[],
	pyStyleConfig: string | undefined,
): Invocation {
	const config =
		pyStyleConfig !== undefined && pyStyleConfig.length > 0
			? ["--config", pyStyleConfig]
			: [];
	return {
		command,
		args: ["format", "--check", "--diff", ...config, "--", ...files],
	};
}

/**
 * `mypy <files>`
 *
 * @pure true
 */
export function buildMypyInvocation(
	command: string,
	files: readonly string[],
): Invocation {
	return { command, args: [...files] };
}

/**
 * Single-line rendering used for `Running:` echoes and reproduce hints.
 *
 * @pure true
 * @example renderCommandLine({ command: "mypy", args: ["a.py"] }) // "mypy a.py"
 */
export const renderCommandLine = (invocation: Invocation): string =>
	[invocation.command, ...invocation.args].join(" ");

/**
 * Maps a finished process onto the tri-state tool outcome.
 *
 * @pure true
 * @invariant exitCode = 0 → Clean
 * @invariant exitCode ≠ 0 ∧ |stdout| > 0 → NeedsChanges
 * @invariant exitCode ≠ 0 ∧ |stdout| = 0 → InfrastructureFailure
 */
export function classifyProcessOutput(output: ProcessOutput): ToolRunResult {
	if (output.exitCode === 0) {
		return ToolRunResult.Clean({ skipped: false, output: output.stdout });
	}
	if (output.stdout.length > 0) {
		return ToolRunResult.NeedsChanges({
			exitCode: output.exitCode,
			diff: output.stdout,
		});
	}
	return ToolRunResult.InfrastructureFailure({
		exitCode: output.exitCode,
		reason: `exited with code ${String(output.exitCode)} without output`,
	});
}
