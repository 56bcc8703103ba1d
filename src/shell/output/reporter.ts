// CHANGE: Lock-guarded accumulator shared by all per-file workers
// WHY: Printing a report and flipping the aggregate flag must happen as one step
// PURITY: SHELL (console output)
// EFFECT: Effect<FormatAccumulator>
// INVARIANT: reported = number of report() calls that completed; no lost updates
// INVARIANT: lines of one report are written together, never interleaved with another
// COMPLEXITY: O(1) per report

import { Effect, Ref } from "effect";

import { type FormatVerdict, renderReport } from "../../core/verdict.js";

/**
 * Sink receiving the lines of one report.
 */
export type ReportPrinter = (lines: readonly string[]) => void;

/**
 * Writes one report to stdout in a single call.
 */
export const printToStdout: ReportPrinter = (lines) => {
	console.log(lines.join("\n"));
};

export interface FormatAccumulator {
	readonly report: (verdict: FormatVerdict) => Effect.Effect<void>;
	/** Reports printed so far; read by tests and callers that want a count. */
	readonly reported: Effect.Effect<number>;
	readonly needsFormatting: Effect.Effect<boolean>;
}

/**
 * Creates an accumulator whose `report` prints and counts under one permit.
 *
 * @param print Destination of the rendered reports
 */
export function makeAccumulator(
	print: ReportPrinter = printToStdout,
): Effect.Effect<FormatAccumulator> {
	return Effect.gen(function* () {
		const lock = yield* Effect.makeSemaphore(1);
		const count = yield* Ref.make(0);

		const report = (verdict: FormatVerdict): Effect.Effect<void> =>
			lock.withPermits(1)(
				Effect.sync(() => {
					print(renderReport(verdict));
				}).pipe(Effect.zipRight(Ref.update(count, (n) => n + 1))),
			);

		return {
			report,
			reported: Ref.get(count),
			needsFormatting: Effect.map(Ref.get(count), (n) => n > 0),
		};
	});
}
