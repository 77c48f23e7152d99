// CHANGE: Enumerate a revision range and read each commit's message with its author trailer
// PURITY: SHELL (runs git)
// EFFECT: Effect<readonly string[], ExecutionError> / Effect<CommitRecord | null, never>
// INVARIANT: History query failure is fatal; a single unreadable commit yields null
// COMPLEXITY: O(n) git invocations where n = commits in range

import { Effect } from "effect";

import { parseAuthorTrailer } from "../../core/commit/author.js";
import { ExecutionError } from "../../core/errors.js";
import type { CommitRecord, Invocation } from "../../core/models.js";
import { renderCommandLine } from "../../core/tools/invocation.js";
import { type ProcessRunner, runProcess } from "../utils/exec.js";

export const COMMIT_LOG_FORMAT = "%B%nAuthor: %an <%ae>";

export const commitListInvocation = (
	startRev: string,
	endRev: string,
): Invocation => ({
	command: "git",
	args: ["log", "--pretty=format:%H", `${startRev}..${endRev}`],
});

export const commitLogInvocation = (commitId: string): Invocation => ({
	command: "git",
	args: ["show", "-s", `--format=${COMMIT_LOG_FORMAT}`, commitId],
});

/**
 * Lists the commit ids in `startRev..endRev`, in git's order.
 *
 * An empty range yields an empty list.
 *
 * @effect Effect<readonly string[], ExecutionError>
 */
export function listCommitIds(
	startRev: string,
	endRev: string,
	runner: ProcessRunner = runProcess,
): Effect.Effect<readonly string[], ExecutionError> {
	const invocation = commitListInvocation(startRev, endRev);
	const command = renderCommandLine(invocation);
	return runner(invocation).pipe(
		Effect.mapError(
			(error) => new ExecutionError({ command, detail: error.detail }),
		),
		Effect.flatMap((output) =>
			output.exitCode === 0
				? Effect.succeed(
						output.stdout
							.split(/\r?\n/u)
							.map((line) => line.trim())
							.filter((line) => line.length > 0),
					)
				: Effect.fail(
						new ExecutionError({
							command,
							detail:
								output.stderr.trim().length > 0
									? output.stderr.trim()
									: `exited with code ${String(output.exitCode)}`,
						}),
					),
		),
	);
}

/**
 * Reads the message of one commit followed by an `Author: name <email>` line.
 *
 * @returns Trimmed text, or null when git fails or prints nothing
 * @effect Effect<string | null, never>
 */
export function readCommitLog(
	commitId: string,
	runner: ProcessRunner = runProcess,
): Effect.Effect<string | null> {
	return runner(commitLogInvocation(commitId)).pipe(
		Effect.map((output) => {
			if (output.exitCode !== 0) return null;
			const text = output.stdout.trim();
			return text.length > 0 ? text : null;
		}),
		Effect.catchAll(() => Effect.succeed(null)),
	);
}

/**
 * Reads one commit as a {@link CommitRecord}.
 *
 * The trailing `Author:` line written by {@link COMMIT_LOG_FORMAT} is moved
 * into `authorName`/`authorEmail`; when it cannot be parsed the whole text
 * stays in `message` and both author fields are empty.
 *
 * @effect Effect<CommitRecord | null, never>
 */
export function readCommitRecord(
	commitId: string,
	runner: ProcessRunner = runProcess,
): Effect.Effect<CommitRecord | null> {
	return readCommitLog(commitId, runner).pipe(
		Effect.map((text): CommitRecord | null => {
			if (text === null) return null;
			const lines = text.split(/\r?\n/u);
			const trailer = parseAuthorTrailer(lines.at(-1) ?? "");
			if (trailer === null) {
				return { id: commitId, message: text, authorName: "", authorEmail: "" };
			}
			return {
				id: commitId,
				message: lines.slice(0, -1).join("\n").trim(),
				authorName: trailer.name,
				authorEmail: trailer.email,
			};
		}),
	);
}
