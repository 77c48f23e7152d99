// CHANGE: Changed-file classification by extension
// FORMAT THEOREM: ∀p, f ∈ {native, python}: f(f(p)) = f(p) ∧ f(p) is a subsequence of p
// PURITY: CORE
// INVARIANT: Order preserved, duplicates kept
// COMPLEXITY: O(n) where n = |paths|

import * as path from "node:path";

/**
 * Extensions (without the dot) handled by the C/C++ formatter.
 */
export const NATIVE_EXTENSIONS: ReadonlySet<string> = new Set([
	"cpp",
	"c",
	"cc",
	"h",
	"hpp",
	"hxx",
	"cxx",
	"inc",
	"cppm",
	"cl",
]);

/**
 * Extension-less files under this prefix are headers (libc++ style).
 */
export const EXTENSIONLESS_HEADER_PREFIX = "libcxx/include";

/**
 * File skipped by the type checker.
 */
export const TYPING_EXCLUDED_PATHS: readonly string[] = [
	"test/unittests/lit.cfg.py",
];

/**
 * Extension of `filePath` without its leading dot ("" when there is none).
 *
 * Dotfiles such as `.clang-format` have no extension.
 *
 * @pure true
 */
export const extensionOf = (filePath: string): string =>
	path.posix.extname(filePath).replace(/^\./u, "");

/**
 * Parses the comma-separated `--changed-files` value.
 *
 * @pure true
 * @example parseChangedFiles("a.cpp,,b.py") // ["a.cpp", "b.py"]
 */
export function parseChangedFiles(
	value: string | undefined,
): readonly string[] {
	if (value === undefined) return [];
	return value.split(",").filter((entry) => entry.length > 0);
}

/**
 * Selects the files the C/C++ formatter checks.
 *
 * @pure true
 */
export function filterNativeSources(
	paths: readonly string[],
): readonly string[] {
	return paths.filter((p) => {
		const ext = extensionOf(p);
		if (NATIVE_EXTENSIONS.has(ext)) return true;
		return ext.length === 0 && p.startsWith(EXTENSIONLESS_HEADER_PREFIX);
	});
}

/**
 * Selects `.py` files.
 *
 * @pure true
 */
export function filterPythonSources(
	paths: readonly string[],
): readonly string[] {
	return paths.filter((p) => extensionOf(p) === "py");
}

/**
 * Drops every path equal to one of `excluded`.
 *
 * @pure true
 */
export function excludePaths(
	paths: readonly string[],
	excluded: readonly string[],
): readonly string[] {
	const skip = new Set(excluded);
	return paths.filter((p) => !skip.has(p));
}

/**
 * Distinct extensions of `paths`, first-seen order.
 *
 * Extension-less files contribute "" so the formatter's own extension
 * filter still lets them through.
 *
 * @pure true
 */
export function collectExtensions(paths: readonly string[]): readonly string[] {
	return [...new Set(paths.map(extensionOf))];
}
