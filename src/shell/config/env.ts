// CHANGE: Resolve run options from flags and environment via Effect Config
// WHY: Flags win over environment, environment wins over built-in defaults
// PURITY: SHELL (reads the environment through the default ConfigProvider)
// EFFECT: Effect<FormatCheckOptions, ConfigurationError>
// COMPLEXITY: O(1)

import { availableParallelism } from "node:os";

import { Config, Effect } from "effect";

import { ConfigurationError } from "../../core/errors.js";
import type { FormatCheckOptions } from "../../core/models.js";
import { type CheckFlags, POSITIVE_INTEGER } from "./cli.js";

export const DEFAULT_FORMATTER = "clang-format";

const formatterConfig = Config.string("CLANG_FORMAT").pipe(
	Config.validate({
		message: "must not be empty",
		validation: (value: string) => value.length > 0,
	}),
	Config.withDefault(DEFAULT_FORMATTER),
);

// Same grammar as -j: "1e3", "0x10" and " 4 " are rejected
const jobsConfig = Config.string("CLANG_FORMAT_CHECK_JOBS").pipe(
	Config.validate({
		message: "must be a positive integer",
		validation: (value: string) => POSITIVE_INTEGER.test(value),
	}),
	Config.map((value) => Number.parseInt(value, 10)),
	Config.withDefault(availableParallelism()),
);

/**
 * Fills unset flags from `CLANG_FORMAT` / `CLANG_FORMAT_CHECK_JOBS` or
 * defaults.
 *
 * Environment values are read only for flags that were not given.
 */
export function resolveCheckOptions(
	flags: CheckFlags,
): Effect.Effect<FormatCheckOptions, ConfigurationError> {
	return Effect.gen(function* () {
		const formatter = flags.formatter ?? (yield* formatterConfig);
		const jobs = flags.jobs ?? (yield* jobsConfig);
		return {
			formatter,
			jobs,
			verbose: flags.verbose,
			inputs: flags.inputs,
		};
	}).pipe(
		Effect.mapError(
			(error) => new ConfigurationError({ detail: String(error) }),
		),
	);
}
