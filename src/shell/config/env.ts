// CHANGE: Resolve external tool paths once from the environment
// PURITY: SHELL (reads process.env by default)
// INVARIANT: ∀ key: value = env[key] if non-empty, else the documented default
// COMPLEXITY: O(1)

/**
 * Paths of the external binaries, fixed for the whole run.
 *
 * @property clangFormat `$CLANG_FORMAT_PATH`, default `git-clang-format`
 * @property ruff `$RUFF_FORMAT_PATH`, default `ruff`
 * @property mypy `$MYPY_PATH`, default `mypy`
 */
export interface ToolPaths {
	readonly clangFormat: string;
	readonly ruff: string;
	readonly mypy: string;
}

export const DEFAULT_TOOL_PATHS: ToolPaths = {
	clangFormat: "git-clang-format",
	ruff: "ruff",
	mypy: "mypy",
};

const ENV_KEYS = {
	clangFormat: "CLANG_FORMAT_PATH",
	ruff: "RUFF_FORMAT_PATH",
	mypy: "MYPY_PATH",
} as const satisfies Record<keyof ToolPaths, string>;

function pick(
	env: NodeJS.ProcessEnv,
	key: string,
	fallback: string,
): string {
	const value = env[key];
	return value !== undefined && value.length > 0 ? value : fallback;
}

/**
 * Builds {@link ToolPaths} from an environment map.
 *
 * @example
 * ```ts
 * loadToolPaths({ RUFF_FORMAT_PATH: "/opt/ruff" }).ruff; // "/opt/ruff"
 * ```
 */
export function loadToolPaths(env: NodeJS.ProcessEnv = process.env): ToolPaths {
	return {
		clangFormat: pick(
			env,
			ENV_KEYS.clangFormat,
			DEFAULT_TOOL_PATHS.clangFormat,
		),
		ruff: pick(env, ENV_KEYS.ruff, DEFAULT_TOOL_PATHS.ruff),
		mypy: pick(env, ENV_KEYS.mypy, DEFAULT_TOOL_PATHS.mypy),
	};
}
