// CHANGE: ruff helper for Python formatting
// PURITY: SHELL (binds the configured binary path)
// INVARIANT: Only `.py` files reach the tool; stdout of a clean run is surfaced

import { filterPythonSources } from "../../core/files/classify.js";
import type { FormatArgs } from "../../core/models.js";
import {
	buildRuffInvocation,
	classifyProcessOutput,
} from "../../core/tools/invocation.js";
import type { ToolPaths } from "../config/env.js";
import type { ToolHelper } from "./tool.js";

/**
 * `ruff format --check --diff [--config <cfg>] -- <files>`
 */
export function makeRuffHelper(paths: ToolPaths): ToolHelper<FormatArgs> {
	return {
		name: "ruff",
		friendlyName: "Python code formatter",
		issueKind: "formatting",
		forwardStderr: "verbose",
		surfaceCleanOutput: true,
		filterFiles: filterPythonSources,
		buildInvocation: (files, args) =>
			buildRuffInvocation(paths.ruff, files, args.pyStyleConfig),
		interpret: classifyProcessOutput,
	};
}
