// CHANGE: Public API entry point for programmatic use of the CI helpers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect-returning entry points
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINTS (argv → Effect<ExitCode>)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Programmatic equivalents of the three executables.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { checkCommitLogsMain } from "ci-guard";
 *
 * const code = await Effect.runPromise(
 *   checkCommitLogsMain(["--start-rev", "origin/main", "--end-rev", "HEAD"]),
 * );
 * ```
 */
export {
	checkCommitLogsMain,
	formatHelperMain,
	typingHelperMain,
} from "./main.js";
export { checkCommitLogs } from "./app/checkCommitLogs.js";
export { runFormatters } from "./app/runFormatters.js";
export { runTypeCheck } from "./app/runTypeCheck.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CommitFailure,
	CommitRangeArgs,
	CommitRecord,
	ExitCode,
	FormatArgs,
	Invocation,
	ProcessOutput,
	TypingArgs,
	ValidationResult,
} from "./core/models.js";
export { ToolRunResult } from "./core/models.js";
export {
	type AppError,
	ExecutionError,
	MissingToolError,
	SpawnError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CommitRunSummary,
	summarizeCommits,
	validateCommitMessage,
	validateCommitRecord,
} from "./core/commit/validate.js";
export { computeExitCode } from "./core/decision.js";
export {
	filterNativeSources,
	filterPythonSources,
	parseChangedFiles,
} from "./core/files/classify.js";
export { classifyProcessOutput } from "./core/tools/invocation.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SEAMS
// ═══════════════════════════════════════════════════════════════════════════════

export { loadToolPaths, type ToolPaths } from "./shell/config/env.js";
export { type ProcessRunner, runProcess } from "./shell/utils/exec.js";
export { runTool, type ToolHelper } from "./shell/tools/index.js";
