// CHANGE: Spawn external commands from an argument vector with byte-exact stdout capture
// WHY: Joining tokens into one shell string breaks on file names with spaces;
//      the diff check compares raw bytes, so stdout must not be decoded
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandResult, ToolLaunchError>
// INVARIANT: launched ∧ closed → CommandResult; ¬launched → ToolLaunchError
// COMPLEXITY: O(1) time, O(n) space where n = stdout length

import { type ChildProcessByStdio, spawn } from "node:child_process";
import { constants } from "node:os";
import type { Readable } from "node:stream";

import { Effect } from "effect";

import { renderCommand } from "../../core/command.js";
import { errorDetail, ToolLaunchError } from "../../core/errors.js";
import type { CommandLine, CommandResult } from "../../core/models.js";

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

/**
 * Maps a `close` event to a single numeric status.
 *
 * @pure true
 * @invariant signal ≠ null ∧ code = null → 128 + signo (shell convention)
 */
export function toExitStatus(
	code: number | null,
	signal: NodeJS.Signals | null,
): number {
	if (code !== null) return code;
	const signo = signal === null ? undefined : SIGNAL_NUMBERS.get(signal);
	return signo === undefined ? 1 : 128 + signo;
}

/**
 * Runs `commandLine[0]` with the remaining tokens as arguments.
 *
 * Standard input is closed; standard output is collected chunk by chunk until
 * the stream ends, then the exit status is taken from the `close` event.
 * Interrupting the returned effect kills the child.
 *
 * @param commandLine Executable followed by its arguments
 * @returns Effect with the captured result, or ToolLaunchError when spawning fails
 *
 * @pure false (spawns an OS process)
 * @effect Effect<CommandResult, ToolLaunchError>
 * @complexity O(n) where n = output size
 */
export function runCommand(
	commandLine: CommandLine,
): Effect.Effect<CommandResult, ToolLaunchError> {
	const [executable, ...args] = commandLine;
	return Effect.async<CommandResult, ToolLaunchError>((resume) => {
		const stdout: Buffer[] = [];
		const stderr: Buffer[] = [];
		let settled = false;

		const launchFailed = (error: unknown): void => {
			if (settled) return;
			settled = true;
			resume(
				Effect.fail(
					new ToolLaunchError({
						command: renderCommand(commandLine),
						reason: errorDetail(error),
					}),
				),
			);
		};

		// spawn throws synchronously on invalid arguments (e.g. an empty executable)
		let child: ChildProcessByStdio<null, Readable, Readable>;
		try {
			child = spawn(executable, args, {
				stdio: ["ignore", "pipe", "pipe"],
			});
		} catch (error) {
			launchFailed(error);
			return;
		}

		child.stdout.on("data", (chunk: Buffer) => {
			stdout.push(chunk);
		});
		child.stderr.on("data", (chunk: Buffer) => {
			stderr.push(chunk);
		});

		child.once("error", launchFailed);

		child.once("close", (code, signal) => {
			if (settled) return;
			settled = true;
			resume(
				Effect.succeed({
					stdout: Buffer.concat(stdout),
					stderr: Buffer.concat(stderr).toString("utf8"),
					status: toExitStatus(code, signal),
				}),
			);
		});

		return Effect.sync(() => {
			if (!settled) {
				settled = true;
				child.kill();
			}
		});
	});
}
