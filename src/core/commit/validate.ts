// CHANGE: Commit message validation with full failure accumulation
// FORMAT THEOREM: ∀m: validate(m).failures = [c(m) | c ∈ COMMIT_CHECKS, c(m) ≠ null]
// PURITY: CORE
// INVARIANT: blank message → failures = [EMPTY_COMMIT_MESSAGE]; otherwise every check runs
// COMPLEXITY: O(k·n) where k = |checks|, n = |lines|

import type {
	CommitFailure,
	CommitRecord,
	ValidationResult,
} from "../models.js";
import { renderAuthorTrailer } from "./author.js";
import {
	COMMIT_CHECKS,
	EMPTY_COMMIT_MESSAGE,
	splitMessageLines,
} from "./checks.js";

/**
 * Validates one commit message against every structural rule.
 *
 * @pure true
 * @postcondition result.valid ⇔ result.failures.length = 0
 *
 * @example
 * ```ts
 * validateCommitMessage("add x").failures[0];
 * // "Invalid header format. Should be: <type>[<SCOPE>]: <short-summary>"
 * ```
 */
export function validateCommitMessage(message: string): ValidationResult {
	if (message.trim().length === 0) {
		return { valid: false, failures: [EMPTY_COMMIT_MESSAGE] };
	}
	const lines = splitMessageLines(message);
	const failures = COMMIT_CHECKS.map((check) => check(lines)).filter(
		(reason): reason is string => reason !== null,
	);
	return { valid: failures.length === 0, failures };
}

/**
 * Validates a commit read from history.
 *
 * The body is checked with the author trailer rebuilt from the record's
 * author fields appended, so an empty body is rejected on its own.
 *
 * @pure true
 */
export function validateCommitRecord(record: CommitRecord): ValidationResult {
	if (record.message.trim().length === 0) {
		return { valid: false, failures: [EMPTY_COMMIT_MESSAGE] };
	}
	const hasAuthor =
		record.authorName.length > 0 || record.authorEmail.length > 0;
	return validateCommitMessage(
		hasAuthor
			? `${record.message}\n${renderAuthorTrailer(record.authorName, record.authorEmail)}`
			: record.message,
	);
}

/**
 * Aggregate over a commit range.
 *
 * @invariant failingCommits ≤ |commits| ∧ failingCommits ≤ |failures|
 */
export interface CommitRunSummary {
	readonly checkedCommits: number;
	readonly failingCommits: number;
	readonly failures: readonly CommitFailure[];
}

/**
 * Flattens per-commit results into (commit, reason) pairs, keeping
 * enumeration order.
 *
 * @pure true
 * @complexity O(n + f) where n = commits, f = failures
 */
export function summarizeCommits(
	results: ReadonlyArray<{
		readonly commitId: string;
		readonly result: ValidationResult;
	}>,
): CommitRunSummary {
	const failures = results.flatMap(({ commitId, result }) =>
		result.failures.map((reason) => ({ commitId, reason })),
	);
	return {
		checkedCommits: results.length,
		failingCommits: results.filter(({ result }) => !result.valid).length,
		failures,
	};
}
