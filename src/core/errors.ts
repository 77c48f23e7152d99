// CHANGE: Typed domain error ADT built on Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Command line could not be turned into arguments.
 *
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * The revision-range history query failed; no commit can be checked.
 *
 * @invariant command.length > 0
 */
export class ExecutionError extends Data.TaggedError("ExecutionError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * A child process could not be started at all (missing binary, EACCES, ...).
 */
export class SpawnError extends Data.TaggedError("SpawnError")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * A required external tool did not answer its availability probe.
 */
export class MissingToolError extends Data.TaggedError("MissingToolError")<{
	readonly tool: string;
	readonly command: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| UsageError
	| ExecutionError
	| SpawnError
	| MissingToolError;
