// CHANGE: getopt-style argument parsing for the format gate
// WHY: Misuse must be reported before any discovery happens
// PURITY: CORE-like (pure over the given argv; reads process.argv only as default)
// INVARIANT: Either.left ⇔ unknown option ∨ missing/invalid value ∨ no inputs
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { ArgumentError } from "../../core/errors.js";

export const PROGRAM_NAME = "clang-format-check";

/**
 * Flags of a check run; unset values are filled from configuration later.
 */
export interface CheckFlags {
	readonly formatter: string | undefined;
	readonly jobs: number | undefined;
	readonly verbose: boolean;
	readonly inputs: readonly string[];
}

export type CliCommand =
	| { readonly _tag: "Help" }
	| { readonly _tag: "Check"; readonly flags: CheckFlags };

interface ParseState extends CheckFlags {
	readonly help: boolean;
}

type ValueHandler = (
	state: ParseState,
	value: string,
	name: string,
) => Either.Either<ParseState, ArgumentError>;

type FlagHandler = (state: ParseState) => ParseState;

type OptionSpec =
	| { readonly kind: "value"; readonly apply: ValueHandler }
	| { readonly kind: "flag"; readonly apply: FlagHandler };

/** Digits only, no sign, no leading zero; shared by `-j` and the environment. */
export const POSITIVE_INTEGER = /^[1-9]\d*$/u;

const formatterOption: OptionSpec = {
	kind: "value",
	apply: (state, value) => Either.right({ ...state, formatter: value }),
};

const jobsOption: OptionSpec = {
	kind: "value",
	apply: (state, value, name) =>
		POSITIVE_INTEGER.test(value)
			? Either.right({ ...state, jobs: Number.parseInt(value, 10) })
			: Either.left(
					new ArgumentError({
						detail: `The option ${name} expects a positive integer, got "${value}"`,
					}),
				),
};

const verboseOption: OptionSpec = {
	kind: "flag",
	apply: (state) => ({ ...state, verbose: true }),
};

const helpOption: OptionSpec = {
	kind: "flag",
	apply: (state) => ({ ...state, help: true }),
};

// Lookup table instead of a switch keeps processOption flat
const OPTIONS: Readonly<Record<string, OptionSpec | undefined>> = {
	"-c": formatterOption,
	"--clang-format": formatterOption,
	"-j": jobsOption,
	"--jobs": jobsOption,
	"-v": verboseOption,
	"--verbose": verboseOption,
	"-h": helpOption,
	"--help": helpOption,
};

interface SplitOption {
	readonly name: string;
	readonly inline: string | undefined;
}

/**
 * Splits `--name=value` and `-xVALUE` into name and inline value.
 *
 * @pure true
 */
function splitOption(arg: string): SplitOption {
	if (arg.startsWith("--")) {
		const eq = arg.indexOf("=");
		return eq === -1
			? { name: arg, inline: undefined }
			: { name: arg.slice(0, eq), inline: arg.slice(eq + 1) };
	}
	return arg.length > 2
		? { name: arg.slice(0, 2), inline: arg.slice(2) }
		: { name: arg, inline: undefined };
}

interface OptionStep {
	readonly state: ParseState;
	readonly consumedNext: boolean;
}

function processOption(
	arg: string,
	next: string | undefined,
	state: ParseState,
): Either.Either<OptionStep, ArgumentError> {
	const { name, inline } = splitOption(arg);
	const option = OPTIONS[name];
	if (option === undefined) {
		return Either.left(new ArgumentError({ detail: `Unknown option ${arg}` }));
	}

	if (option.kind === "flag") {
		if (inline !== undefined) {
			return Either.left(
				new ArgumentError({
					detail: name.startsWith("--")
						? `The option ${name} does not take an argument`
						: `Unknown option ${arg}`,
				}),
			);
		}
		return Either.right({ state: option.apply(state), consumedNext: false });
	}

	const value = inline ?? next;
	if (value === undefined) {
		return Either.left(
			new ArgumentError({ detail: `The option ${name} requires an argument` }),
		);
	}
	return Either.map(option.apply(state, value, name), (applied) => ({
		state: applied,
		consumedNext: inline === undefined,
	}));
}

const isOption = (arg: string): boolean => arg.startsWith("-") && arg !== "-";

/**
 * Parses command line arguments.
 *
 * Options and inputs may be interleaved; `--` ends option parsing. Like
 * getopt, a value-taking option consumes the next token even when it starts
 * with a dash.
 *
 * @param args Arguments without the node and script entries
 * @returns Help request, check flags, or the first misuse found
 *
 * @example
 * ```ts
 * parseCLIArgs(["-c", "clang-format-17", "src"]);
 * // Right({ _tag: "Check", flags: { formatter: "clang-format-17", inputs: ["src"], ... } })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CliCommand, ArgumentError> {
	let state: ParseState = {
		formatter: undefined,
		jobs: undefined,
		verbose: false,
		help: false,
		inputs: [],
	};
	let optionsEnded = false;

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;

		if (optionsEnded || !isOption(arg)) {
			state = { ...state, inputs: [...state.inputs, arg] };
			continue;
		}
		if (arg === "--") {
			optionsEnded = true;
			continue;
		}

		const step = processOption(arg, args[i + 1], state);
		if (Either.isLeft(step)) return Either.left(step.left);
		state = step.right.state;
		if (step.right.consumedNext) i++;
	}

	if (state.help) return Either.right<CliCommand>({ _tag: "Help" });
	if (state.inputs.length === 0) {
		return Either.left(new ArgumentError({ detail: "No inputs given" }));
	}

	return Either.right<CliCommand>({
		_tag: "Check",
		flags: {
			formatter: state.formatter,
			jobs: state.jobs,
			verbose: state.verbose,
			inputs: state.inputs,
		},
	});
}

/**
 * Usage and option summary shown by `--help` and after argument errors.
 *
 * @pure true
 */
export function renderUsage(program: string = PROGRAM_NAME): string {
	return [
		`Usage: ${program} [options] <inputs...>`,
		"Checks the given inputs for code style changes",
		"",
		"Options:",
		"  -c, --clang-format <path>    The clang-format executable to use (default: $CLANG_FORMAT or clang-format)",
		"  -j, --jobs <n>               Number of files checked in parallel (default: $CLANG_FORMAT_CHECK_JOBS or CPU count)",
		"  -v, --verbose                Log every formatter invocation to stderr",
		"  -h, --help                   Show this help and exit",
	].join("\n");
}
