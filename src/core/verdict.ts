// CHANGE: Per-file verdict model and the pure formatting decision
// WHY: Keep the diff decision free of IO so it can be checked exhaustively
// PURITY: CORE
// INVARIANT: status ≠ 0 → ToolFailure regardless of output equality
// INVARIANT: status = 0 ∧ stdout ≡ original (byte-wise) → no verdict
// COMPLEXITY: O(n) where n = file size (byte comparison)

import { Data, Option } from "effect";
import { match } from "ts-pattern";

import { renderCommand } from "./command.js";
import type { CommandLine, CommandResult } from "./models.js";

/**
 * Reason a file does not conform. Absence of a verdict means it conforms.
 *
 * - FormatMismatch: formatter succeeded and its output differs from disk
 * - ToolFailure: formatter launched but exited nonzero (syntax error,
 *   bad flag, ...)
 */
export type FormatVerdict = Data.TaggedEnum<{
	FormatMismatch: { readonly file: string };
	ToolFailure: {
		readonly file: string;
		readonly command: string;
		readonly status: number;
		readonly stderr: string;
	};
}>;

export const FormatVerdict = Data.taggedEnum<FormatVerdict>();

/**
 * Decides the verdict for one file from its on-disk bytes and the
 * formatter result.
 *
 * @param file Path of the checked file, as discovered
 * @param commandLine Formatter invocation that produced `result`
 * @param original File content read before the formatter ran
 * @param result Captured formatter outcome
 * @returns None when the file conforms
 *
 * @pure true
 * @complexity O(n) where n = max(|original|, |stdout|)
 */
export function judgeFormatting(
	file: string,
	commandLine: CommandLine,
	original: Uint8Array,
	result: CommandResult,
): Option.Option<FormatVerdict> {
	if (result.status !== 0) {
		return Option.some(
			FormatVerdict.ToolFailure({
				file,
				command: renderCommand(commandLine),
				status: result.status,
				stderr: result.stderr,
			}),
		);
	}
	return Buffer.compare(original, result.stdout) === 0
		? Option.none()
		: Option.some(FormatVerdict.FormatMismatch({ file }));
}

// Formatter diagnostics can run to many lines; the report keeps one
const firstLine = (text: string): Option.Option<string> =>
	Option.fromNullable(
		text
			.split(/\r?\n/u)
			.map((line) => line.trimEnd())
			.find((line) => line.length > 0),
	);

/**
 * One-line explanation of a verdict. A ToolFailure is followed by the first
 * non-empty line of the formatter's stderr, when there is one.
 *
 * @pure true
 */
export function describeVerdict(verdict: FormatVerdict): string {
	return match(verdict)
		.with(
			{ _tag: "FormatMismatch" },
			(v) => `${v.file} changes when formatted.`,
		)
		.with({ _tag: "ToolFailure" }, (v) => {
			const head =
				`Got return code ${v.status} when executing ${v.command}`;
			return Option.match(firstLine(v.stderr), {
				onNone: () => head,
				onSome: (line) => `${head}\n${line}`,
			});
		})
		.exhaustive();
}

/**
 * Lines written to the report for one nonconforming file.
 *
 * @pure true
 */
export function renderReport(verdict: FormatVerdict): readonly string[] {
	return [
		`File "${verdict.file}" needs formatting`,
		describeVerdict(verdict),
	];
}
