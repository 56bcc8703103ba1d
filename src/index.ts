// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration and CORE utilities; SHELL internals stay reachable only through them
// PURITY: Re-exports only (meta-module)
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format gate orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runFormatCheck } from "clang-format-check";
 *
 * const exitCode = await Effect.runPromise(
 *   runFormatCheck({
 *     formatter: "clang-format",
 *     inputs: ["src", "include"],
 *     jobs: 4,
 *     verbose: false,
 *   }),
 * );
 * ```
 */
export { runFormatCheck } from "./app/runFormatCheck.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	CheckSettings,
	CommandLine,
	CommandResult,
	DecisionState,
	ExitCode,
	FormatCheckOptions,
} from "./core/models.js";
export {
	ArgumentError,
	type AppError,
	ConfigurationError,
	DiscoveryError,
	type FatalError,
	FileReadError,
	ToolLaunchError,
	describeError,
} from "./core/errors.js";
export {
	FormatVerdict,
	describeVerdict,
	judgeFormatting,
	renderReport,
} from "./core/verdict.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode } from "./core/decision.js";
export { renderCommand } from "./core/command.js";
export { SOURCE_EXTENSIONS, hasSourceExtension } from "./core/extensions.js";

// ═══════════════════════════════════════════════════════════════════════════════
// BUILDING BLOCKS
// ═══════════════════════════════════════════════════════════════════════════════

export { discoverSourceFiles, listSourceFiles } from "./shell/discovery/files.js";
export { checkFileFormat } from "./shell/format/check.js";
export { runCommand } from "./shell/utils/exec.js";
export { parseCLIArgs, renderUsage } from "./shell/config/cli.js";
