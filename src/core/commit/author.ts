// CHANGE: Author line parsing shared by the validator and the history reader
// PURITY: CORE
// INVARIANT: Parsing never throws; absent fields are reported as null
// COMPLEXITY: O(n) where n = |line|

/**
 * Mail domain every author address must use.
 *
 * Organizational policy, deliberately not configurable.
 */
export const AUTHOR_EMAIL_DOMAIN = "is.ic";

export const AUTHOR_PREFIX = "Author:";

/**
 * Address a commit by `name` must carry, angle brackets included.
 *
 * @pure true
 * @example expectedAuthorEmail("jdoe") // "<jdoe@is.ic>"
 */
export const expectedAuthorEmail = (name: string): string =>
	`<${name}@${AUTHOR_EMAIL_DOMAIN}>`;

/**
 * Splits `Author: <name> <email>` into its whitespace-separated tokens.
 *
 * Only the first two tokens after the prefix are considered, so a name
 * containing spaces yields its first word as the name and its second word
 * as the e-mail token.
 *
 * @returns Tokens or null when either is missing
 * @pure true
 */
export function parseAuthorTokens(
	line: string,
): { readonly name: string; readonly email: string } | null {
	const tokens = line.trim().split(/\s+/u);
	const name = tokens.at(1);
	const email = tokens.at(2);
	if (name === undefined || email === undefined) return null;
	return { name, email };
}

/**
 * Inverse of {@link parseAuthorTrailer}.
 *
 * @pure true
 */
export const renderAuthorTrailer = (name: string, email: string): string =>
	`${AUTHOR_PREFIX} ${name} <${email}>`;

const TRAILER_PATTERN = /^Author: (.*) <([^<>]*)>$/u;

/**
 * Parses the trailer appended by `git show --format=%B%nAuthor: %an <%ae>`.
 *
 * Unlike {@link parseAuthorTokens} this keeps multi-word names intact and
 * strips the angle brackets from the address.
 *
 * @pure true
 */
export function parseAuthorTrailer(
	line: string,
): { readonly name: string; readonly email: string } | null {
	const text = line.trim();
	if (!TRAILER_PATTERN.test(text)) return null;
	// The address holds no "<", so the last " <" separates it from the name.
	const open = text.lastIndexOf(" <");
	return {
		name: text.slice(AUTHOR_PREFIX.length + 1, open),
		email: text.slice(open + 2, -1),
	};
}
