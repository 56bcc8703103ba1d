// CHANGE: Per-file format check: read, run formatter, judge
// WHY: The only IO-bound step of the gate; the decision itself lives in CORE
// PURITY: SHELL
// EFFECT: Effect<Option<FormatVerdict>, FileReadError | ToolLaunchError>
// INVARIANT: read happens-before formatter run happens-before judgement
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect, type Option } from "effect";

import { renderCommand } from "../../core/command.js";
import {
	errorDetail,
	FileReadError,
	type ToolLaunchError,
} from "../../core/errors.js";
import type { CheckSettings, CommandLine } from "../../core/models.js";
import { type FormatVerdict, judgeFormatting } from "../../core/verdict.js";
import { runCommand } from "../utils/exec.js";

/**
 * Reads the whole file as raw bytes; line endings are left untouched.
 */
export function readSource(file: string): Effect.Effect<Buffer, FileReadError> {
	return Effect.try({
		try: () => fs.readFileSync(file),
		catch: (error) => new FileReadError({ path: file, detail: errorDetail(error) }),
	});
}

/**
 * Checks one file against the formatter's output.
 *
 * @param file Discovered source file
 * @param settings Formatter executable and verbosity
 * @returns None when the file already conforms
 *
 * @pure false (file read, process spawn)
 * @effect Effect<Option<FormatVerdict>, FileReadError | ToolLaunchError>
 */
export function checkFileFormat(
	file: string,
	settings: CheckSettings,
): Effect.Effect<Option.Option<FormatVerdict>, FileReadError | ToolLaunchError> {
	return Effect.gen(function* () {
		const original = yield* readSource(file);
		const commandLine: CommandLine = [settings.formatter, file];
		if (settings.verbose) {
			console.error(`   ↳ Command: ${renderCommand(commandLine)}`);
		}
		const result = yield* runCommand(commandLine);
		return judgeFormatting(file, commandLine, original, result);
	});
}
