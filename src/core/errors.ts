// CHANGE: Typed domain error ADT using Effect.Data
// WHY: Errors are explicit values in Effect signatures instead of thrown exceptions
// REF: Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Command line misuse: unknown flag, missing or invalid value, no inputs.
 *
 * @invariant detail.length > 0
 */
export class ArgumentError extends Data.TaggedError("ArgumentError")<{
	readonly detail: string;
}> {}

/**
 * An input path could not be walked.
 *
 * @invariant reason = "NotFound" → path does not exist at discovery time
 */
export class DiscoveryError extends Data.TaggedError("DiscoveryError")<{
	readonly path: string;
	readonly reason: "NotFound" | "Unreadable";
	readonly detail: string;
}> {}

/**
 * A discovered source file could not be read.
 */
export class FileReadError extends Data.TaggedError("FileReadError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * The formatter could not be spawned at all (distinct from a nonzero exit).
 */
export class ToolLaunchError extends Data.TaggedError("ToolLaunchError")<{
	readonly command: string;
	readonly reason: string;
}> {}

/**
 * An environment setting failed to parse or validate.
 */
export class ConfigurationError extends Data.TaggedError(
	"ConfigurationError",
)<{
	readonly detail: string;
}> {}

/**
 * Errors that abort a run after arguments were accepted.
 */
export type FatalError =
	| DiscoveryError
	| FileReadError
	| ToolLaunchError
	| ConfigurationError;

/**
 * Union of every application error.
 */
export type AppError = ArgumentError | FatalError;

/**
 * Human-readable one-line description of an application error.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeError(error: AppError): string {
	return match(error)
		.with({ _tag: "ArgumentError" }, (e) => e.detail)
		.with({ _tag: "DiscoveryError", reason: "NotFound" }, (e) =>
			`Input path not found: ${e.path}`,
		)
		.with({ _tag: "DiscoveryError", reason: "Unreadable" }, (e) =>
			`Unable to scan ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "FileReadError" }, (e) =>
			`Unable to open src file ${e.path}: ${e.detail}`,
		)
		.with({ _tag: "ToolLaunchError" }, (e) =>
			`Unable to run ${e.command}: ${e.reason}`,
		)
		.with({ _tag: "ConfigurationError" }, (e) =>
			`Invalid configuration: ${e.detail}`,
		)
		.exhaustive();
}

/**
 * Extracts a message from whatever a Node API threw.
 *
 * @pure true
 */
export function errorDetail(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
