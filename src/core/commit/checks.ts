// CHANGE: Structural checks over a commit message, one function per rule
// PURITY: CORE
// INVARIANT: ∀ check: check(lines) = null ⇔ rule satisfied; otherwise a single failure reason
// COMPLEXITY: O(n) per check where n = |lines|

import {
	AUTHOR_EMAIL_DOMAIN,
	AUTHOR_PREFIX,
	expectedAuthorEmail,
	parseAuthorTokens,
} from "./author.js";

/**
 * A check returns the failure reason, or null when the message passes.
 */
export type CommitCheck = (lines: readonly string[]) => string | null;

export const EMPTY_COMMIT_MESSAGE = "Empty commit message";
export const INVALID_HEADER =
	"Invalid header format. Should be: <type>[<SCOPE>]: <short-summary>";
export const MALFORMED_JIRA =
	"JIRA reference should be in format: <PROJ-123>";
export const MISSING_AUTHOR = "Missing author or email";

// Word characters in any script: letters, digits, underscore.
const HEADER_PATTERN = /^([\p{L}\p{N}_]+)\[([\p{L}\p{N}_]+)\]: (.+)$/u;
const JIRA_PREFIX = "JIRA:";
const JIRA_PATTERN = /^[A-Z0-9]+-[0-9]+/u;

/**
 * Splits raw message text into lines (LF or CRLF).
 *
 * @pure true
 */
export const splitMessageLines = (message: string): readonly string[] =>
	message.split(/\r?\n/u);

export const missingSection = (label: string): string =>
	`Missing '${label}' section`;

/**
 * First non-empty line must read `type[SCOPE]: summary`.
 */
export const checkHeader: CommitCheck = (lines) => {
	const header = lines.find((line) => line.length > 0);
	if (header === undefined) return EMPTY_COMMIT_MESSAGE;
	return HEADER_PATTERN.test(header) ? null : INVALID_HEADER;
};

const requireSection =
	(prefixes: readonly string[], label: string): CommitCheck =>
	(lines) =>
		lines.some((line) => prefixes.some((prefix) => line.startsWith(prefix)))
			? null
			: missingSection(label);

export const checkProblemOrTask = requireSection(
	["Problem:", "Task:"],
	"Problem/Task:",
);

export const checkSolution = requireSection(["Solution:"], "Solution:");

export const checkTest = requireSection(["Test:"], "Test:");

/**
 * First `JIRA:` line must carry a reference such as `PROJ-123`.
 *
 * The reference is the text between the first and second colon, trimmed;
 * only its prefix has to match.
 */
export const checkJira: CommitCheck = (lines) => {
	const line = lines.find((l) => l.startsWith(JIRA_PREFIX));
	if (line === undefined) return missingSection(JIRA_PREFIX);
	const reference = line.split(":").slice(1, 2).join("").trim();
	return JIRA_PATTERN.test(reference) ? null : MALFORMED_JIRA;
};

/**
 * Last `Author:` line must read `Author: name <name@is.ic>`.
 */
export const checkAuthorEmail: CommitCheck = (lines) => {
	const line = lines.findLast((l) => l.startsWith(AUTHOR_PREFIX));
	if (line === undefined) return MISSING_AUTHOR;
	const tokens = parseAuthorTokens(line);
	if (tokens === null) return MISSING_AUTHOR;
	if (tokens.email === expectedAuthorEmail(tokens.name)) return null;
	return `${tokens.name} ${tokens.email}: email does not match format <username>@${AUTHOR_EMAIL_DOMAIN}`;
};

/**
 * Every rule, in reporting order.
 */
export const COMMIT_CHECKS: readonly CommitCheck[] = [
	checkHeader,
	checkProblemOrTask,
	checkSolution,
	checkTest,
	checkJira,
	checkAuthorEmail,
];
