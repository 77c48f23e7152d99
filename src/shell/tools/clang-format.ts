// CHANGE: git-clang-format helper for C/C++ sources
// PURITY: SHELL (binds the configured binary path)
// INVARIANT: Only native sources reach the tool; stderr is always forwarded
// COMPLEXITY: O(n) where n = |files|

import { filterNativeSources } from "../../core/files/classify.js";
import type { FormatArgs } from "../../core/models.js";
import {
	buildClangFormatInvocation,
	classifyProcessOutput,
} from "../../core/tools/invocation.js";
import type { ToolPaths } from "../config/env.js";
import type { ToolHelper } from "./tool.js";

/**
 * `git-clang-format --diff <start> <end> --extensions <exts> -- <files>`
 *
 * @param paths Resolved tool paths (`clangFormat` is used)
 */
export function makeClangFormatHelper(
	paths: ToolPaths,
): ToolHelper<FormatArgs> {
	return {
		name: "clang-format",
		friendlyName: "C/C++ code formatter",
		issueKind: "formatting",
		forwardStderr: "always",
		surfaceCleanOutput: false,
		filterFiles: filterNativeSources,
		buildInvocation: (files, args) =>
			buildClangFormatInvocation(paths.clangFormat, files, args),
		interpret: classifyProcessOutput,
	};
}
