// CHANGE: Render argument vectors for log lines and verdict messages
// WHY: Commands are spawned without a shell; the rendered form is display-only
// PURITY: CORE
// INVARIANT: tokens without whitespace or quotes are rendered verbatim
// COMPLEXITY: O(n) where n = total token length

import type { CommandLine } from "./models.js";

const NEEDS_QUOTING = /[\s"']/u;

/**
 * Joins the tokens with single spaces, JSON-quoting those that would be split
 * or misread when pasted into a shell.
 *
 * @example
 * ```ts
 * renderCommand(["clang-format", "src/my file.cpp"]);
 * // => 'clang-format "src/my file.cpp"'
 * ```
 */
export function renderCommand(commandLine: CommandLine): string {
	return commandLine
		.map((token) =>
			token.length === 0 || NEEDS_QUOTING.test(token)
				? JSON.stringify(token)
				: token,
		)
		.join(" ");
}
