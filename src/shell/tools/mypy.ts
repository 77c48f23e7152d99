// CHANGE: mypy helper for Python static typing
// PURITY: SHELL (binds the configured binary path)

import { filterPythonSources } from "../../core/files/classify.js";
import type { TypingArgs } from "../../core/models.js";
import {
	buildMypyInvocation,
	classifyProcessOutput,
} from "../../core/tools/invocation.js";
import type { ToolPaths } from "../config/env.js";
import type { ProbedToolHelper } from "./tool.js";

/**
 * `mypy <files>`, probed with `--version` before it runs.
 */
export function makeMypyHelper(
	paths: ToolPaths,
): ProbedToolHelper<TypingArgs> {
	return {
		name: "mypy",
		friendlyName: "Static Typing for Python",
		issueKind: "typing",
		probeInvocation: { command: paths.mypy, args: ["--version"] },
		forwardStderr: "verbose",
		surfaceCleanOutput: true,
		filterFiles: filterPythonSources,
		buildInvocation: (files) => buildMypyInvocation(paths.mypy, files),
		interpret: classifyProcessOutput,
	};
}
