// CHANGE: Barrel for the tool helpers
// PURITY: SHELL (re-exports only)

export { makeClangFormatHelper } from "./clang-format.js";
export { makeMypyHelper } from "./mypy.js";
export { makeRuffHelper } from "./ruff.js";
export {
	type ProbedToolHelper,
	probeTool,
	runTool,
	type ToolHelper,
} from "./tool.js";
