// CHANGE: Programmatic CLI entry that returns ExitCode instead of exiting
// WHY: Only the bin module terminates the process; tests drive the CLI through main()
// PURITY: APP (console I/O, no process.exit)
// INVARIANT: ArgumentError → 1 before any discovery; fatal error → 1; otherwise runFormatCheck's code
// COMPLEXITY: O(1) orchestration

import { Effect, Either } from "effect";

import { runFormatCheck } from "./app/runFormatCheck.js";
import { describeError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, renderUsage } from "./shell/config/cli.js";
import { resolveCheckOptions } from "./shell/config/env.js";

/**
 * Runs the command line and resolves with the process exit code.
 *
 * @param args Arguments without the node and script entries
 * @returns 0 conforming, 2 needs formatting, 1 misuse or fatal error
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) {
		console.error(describeError(parsed.left));
		console.error(renderUsage());
		return 1;
	}

	const command = parsed.right;
	if (command._tag === "Help") {
		console.log(renderUsage());
		return 0;
	}

	return Effect.runPromise(
		resolveCheckOptions(command.flags).pipe(
			Effect.flatMap((options) => runFormatCheck(options)),
			Effect.catchAll((error) =>
				Effect.sync((): ExitCode => {
					console.error(`❌ ${describeError(error)}`);
					return 1;
				}),
			),
		),
	);
}
