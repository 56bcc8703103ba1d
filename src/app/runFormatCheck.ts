// CHANGE: Application layer orchestration of the format gate
// WHY: APP composes CORE decisions with SHELL integrations and returns ExitCode as a value
// REF: Architecture (FCIS)
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, DiscoveryError | FileReadError | ToolLaunchError>
// INVARIANT: every discovered file is checked exactly once before the exit code is computed
// COMPLEXITY: O(n) formatter runs where n = discovered files, at most `jobs` at a time

import { Effect, Option } from "effect";

import { computeExitCode } from "../core/decision.js";
import type {
	DiscoveryError,
	FileReadError,
	ToolLaunchError,
} from "../core/errors.js";
import type { ExitCode, FormatCheckOptions } from "../core/models.js";
import { discoverSourceFiles } from "../shell/discovery/files.js";
import { checkFileFormat } from "../shell/format/check.js";
import {
	makeAccumulator,
	printToStdout,
	type ReportPrinter,
} from "../shell/output/reporter.js";

/**
 * Checks every source file under the inputs and returns the exit code.
 *
 * Files are checked concurrently, bounded by `options.jobs`. Nonconforming
 * files are reported as they are found, in no particular order. A fatal
 * error (missing input, unreadable file, formatter that cannot be launched)
 * fails the effect and interrupts the checks still running.
 *
 * @param options Resolved run options
 * @param print Destination of per-file reports (stdout by default)
 * @returns Effect<ExitCode> — 2 if any file needs formatting, else 0
 *
 * @pure false (filesystem, processes, console)
 * @invariant ExitCode ∈ {0, 2} on success
 * @postcondition reported verdicts > 0 ↔ result = 2
 */
export function runFormatCheck(
	options: FormatCheckOptions,
	print: ReportPrinter = printToStdout,
): Effect.Effect<ExitCode, DiscoveryError | FileReadError | ToolLaunchError> {
	return Effect.gen(function* () {
		const files = yield* discoverSourceFiles(options.inputs);
		if (options.verbose) {
			console.error(
				`🔍 Checking ${files.length} file(s) with ${options.formatter} (${options.jobs} jobs)`,
			);
		}

		const accumulator = yield* makeAccumulator(print);

		yield* Effect.forEach(
			files,
			(file) =>
				checkFileFormat(file, options).pipe(
					Effect.flatMap(
						Option.match({
							onNone: () => Effect.void,
							onSome: accumulator.report,
						}),
					),
				),
			{ concurrency: options.jobs, discard: true },
		);

		const needsFormatting = yield* accumulator.needsFormatting;
		return computeExitCode({ needsFormatting });
	});
}
