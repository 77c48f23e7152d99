// CHANGE: Argument parsing for the three CI helpers over a shared flag table
// PURITY: SHELL (defaults to process.argv)
// EFFECT: Effect<CliRequest<A>, UsageError>
// INVARIANT: Unknown flags, missing values and missing required flags are UsageError; --help wins over everything else
// COMPLEXITY: O(n) where n = |argv|

import { Effect } from "effect";

import { UsageError } from "../../core/errors.js";
import { parseChangedFiles } from "../../core/files/classify.js";
import type {
	CommitRangeArgs,
	FormatArgs,
	TypingArgs,
} from "../../core/models.js";

interface FlagSpec {
	readonly name: string;
	readonly kind: "value" | "switch";
	readonly required: boolean;
	readonly metavar?: string;
	readonly help: string;
}

export interface CommandSpec {
	readonly program: string;
	readonly summary: string;
	readonly flags: readonly FlagSpec[];
}

/**
 * Parsed command line: either a request for help or arguments to run with.
 */
export type CliRequest<A> =
	| { readonly _tag: "Help"; readonly usage: string }
	| { readonly _tag: "Run"; readonly args: A };

interface ParsedFlags {
	readonly values: ReadonlyMap<string, string>;
	readonly switches: ReadonlySet<string>;
}

const START_REV: FlagSpec = {
	name: "start-rev",
	kind: "value",
	required: true,
	metavar: "<rev>",
	help: "Compute changes from this revision.",
};

const END_REV: FlagSpec = {
	name: "end-rev",
	kind: "value",
	required: true,
	metavar: "<rev>",
	help: "Compute changes to this revision.",
};

const CHANGED_FILES: FlagSpec = {
	name: "changed-files",
	kind: "value",
	required: false,
	metavar: "<files>",
	help: "Comma separated list of files that have been changed.",
};

const QUIET: FlagSpec = {
	name: "quiet",
	kind: "switch",
	required: false,
	help: "Do not echo commands, stderr or diffs.",
};

export const CHECK_COMMIT_LOGS_SPEC: CommandSpec = {
	program: "ci-check-commit-logs",
	summary:
		"Checks that every commit message in a revision range follows the template.",
	flags: [START_REV, END_REV],
};

export const FORMAT_HELPER_SPEC: CommandSpec = {
	program: "ci-format-helper",
	summary: "Runs ruff and git-clang-format in diff mode over changed files.",
	flags: [
		START_REV,
		END_REV,
		CHANGED_FILES,
		{
			name: "py-style-config",
			kind: "value",
			required: true,
			metavar: "<path>",
			help: "Path to the python style configuration file (ruff.toml).",
		},
		QUIET,
	],
};

export const TYPING_HELPER_SPEC: CommandSpec = {
	program: "ci-typing-helper",
	summary: "Runs mypy over changed Python files.",
	flags: [CHANGED_FILES, QUIET],
};

const flagLabel = (flag: FlagSpec): string =>
	flag.metavar === undefined ? `--${flag.name}` : `--${flag.name} ${flag.metavar}`;

/**
 * Renders the `--help` text of a command.
 *
 * @pure true
 */
export function renderUsage(spec: CommandSpec): string {
	const synopsis = spec.flags
		.map((flag) => (flag.required ? flagLabel(flag) : `[${flagLabel(flag)}]`))
		.join(" ");
	const width = Math.max(...spec.flags.map((flag) => flagLabel(flag).length));
	const options = spec.flags.map(
		(flag) => `  ${flagLabel(flag).padEnd(width)}  ${flag.help}`,
	);
	return [
		`usage: ${spec.program} ${synopsis}`,
		"",
		spec.summary,
		"",
		"options:",
		`  ${"--help".padEnd(width)}  Show this message and exit.`,
		...options,
	].join("\n");
}

function splitInlineValue(arg: string): readonly [string, string | undefined] {
	const eq = arg.indexOf("=");
	return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * One recognised flag occurrence.
 *
 * @property consumed Number of argv entries taken (1, or 2 for `--flag value`)
 */
interface FlagOccurrence {
	readonly flag: FlagSpec;
	readonly value: string | undefined;
	readonly consumed: 1 | 2;
}

const usageError = (detail: string): UsageError => new UsageError({ detail });

function readSwitch(
	flag: FlagSpec,
	inline: string | undefined,
): Effect.Effect<FlagOccurrence, UsageError> {
	return inline === undefined
		? Effect.succeed<FlagOccurrence>({ flag, value: undefined, consumed: 1 })
		: Effect.fail(
				usageError(
					`argument --${flag.name}: ignored explicit argument '${inline}'`,
				),
			);
}

function readValue(
	flag: FlagSpec,
	inline: string | undefined,
	next: string | undefined,
): Effect.Effect<FlagOccurrence, UsageError> {
	if (inline !== undefined) {
		return Effect.succeed<FlagOccurrence>({ flag, value: inline, consumed: 1 });
	}
	if (next === undefined || next.startsWith("--")) {
		return Effect.fail(
			usageError(`argument --${flag.name}: expected one argument`),
		);
	}
	return Effect.succeed<FlagOccurrence>({ flag, value: next, consumed: 2 });
}

/**
 * Reads the flag at `argv[index]`, with its value when it takes one.
 */
function readFlag(
	spec: CommandSpec,
	argv: readonly string[],
	index: number,
): Effect.Effect<FlagOccurrence, UsageError> {
	const arg = argv.at(index) ?? "";
	const [name, inline] = splitInlineValue(arg);
	const flag = spec.flags.find((f) => `--${f.name}` === name);
	if (flag === undefined) {
		return Effect.fail(usageError(`unrecognized argument: ${arg}`));
	}
	return flag.kind === "switch"
		? readSwitch(flag, inline)
		: readValue(flag, inline, argv.at(index + 1));
}

function checkRequired(
	spec: CommandSpec,
	flags: ParsedFlags,
): Effect.Effect<ParsedFlags, UsageError> {
	const missing = spec.flags
		.filter((flag) => flag.required && !flags.values.has(flag.name))
		.map((flag) => `--${flag.name}`);
	return missing.length === 0
		? Effect.succeed(flags)
		: Effect.fail(
				usageError(
					`the following arguments are required: ${missing.join(", ")}`,
				),
			);
}

const isHelp = (arg: string): boolean => arg === "--help" || arg === "-h";

/**
 * Parses `argv` against `spec`, accepting `--flag value` and `--flag=value`.
 *
 * @returns null when help was requested
 */
function parseFlags(
	spec: CommandSpec,
	argv: readonly string[],
): Effect.Effect<ParsedFlags | null, UsageError> {
	if (argv.some(isHelp)) return Effect.succeed(null);
	return Effect.gen(function* () {
		const values = new Map<string, string>();
		const switches = new Set<string>();
		let index = 0;
		while (index < argv.length) {
			if (argv.at(index) === "") {
				index += 1;
				continue;
			}
			const { flag, value, consumed } = yield* readFlag(spec, argv, index);
			if (value === undefined) switches.add(flag.name);
			else values.set(flag.name, value);
			index += consumed;
		}
		return yield* checkRequired(spec, { values, switches });
	});
}

function parseWith<A>(
	spec: CommandSpec,
	argv: readonly string[],
	build: (flags: ParsedFlags) => A,
): Effect.Effect<CliRequest<A>, UsageError> {
	return parseFlags(spec, argv).pipe(
		Effect.map((flags): CliRequest<A> =>
			flags === null
				? { _tag: "Help", usage: renderUsage(spec) }
				: { _tag: "Run", args: build(flags) },
		),
	);
}

// Required flags are guaranteed present by parseFlags.
const valueOf = (flags: ParsedFlags, name: string): string =>
	flags.values.get(name) ?? "";

/**
 * `--start-rev <rev> --end-rev <rev>`
 */
export function parseCheckCommitLogsArgs(
	argv: readonly string[] = process.argv.slice(2),
): Effect.Effect<CliRequest<CommitRangeArgs>, UsageError> {
	return parseWith(CHECK_COMMIT_LOGS_SPEC, argv, (flags) => ({
		startRev: valueOf(flags, "start-rev"),
		endRev: valueOf(flags, "end-rev"),
	}));
}

/**
 * `--start-rev <rev> --end-rev <rev> [--changed-files <files>] --py-style-config <path> [--quiet]`
 */
export function parseFormatHelperArgs(
	argv: readonly string[] = process.argv.slice(2),
): Effect.Effect<CliRequest<FormatArgs>, UsageError> {
	return parseWith(FORMAT_HELPER_SPEC, argv, (flags) => ({
		startRev: valueOf(flags, "start-rev"),
		endRev: valueOf(flags, "end-rev"),
		changedFiles: parseChangedFiles(flags.values.get("changed-files")),
		pyStyleConfig: valueOf(flags, "py-style-config"),
		verbose: !flags.switches.has("quiet"),
	}));
}

/**
 * `[--changed-files <files>] [--quiet]`
 */
export function parseTypingHelperArgs(
	argv: readonly string[] = process.argv.slice(2),
): Effect.Effect<CliRequest<TypingArgs>, UsageError> {
	return parseWith(TYPING_HELPER_SPEC, argv, (flags) => ({
		changedFiles: parseChangedFiles(flags.values.get("changed-files")),
		verbose: !flags.switches.has("quiet"),
	}));
}
