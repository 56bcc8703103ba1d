// CHANGE: Functional Core domain models for the format gate
// WHY: CORE holds only immutable data and pure functions; SHELL performs IO
// REF: Architecture (FCIS)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code of the checker process.
 *
 * @remarks
 * - 0: every discovered file conforms
 * - 1: argument error or fatal error
 * - 2: at least one file needs formatting
 */
export type ExitCode = 0 | 1 | 2;

/**
 * Decision state the exit code is derived from.
 *
 * @remarks
 * - @pure true
 * - @invariant needsFormatting ⇔ at least one verdict was reported
 */
export interface DecisionState {
	readonly needsFormatting: boolean;
}

/**
 * Non-empty argument vector: executable followed by its arguments.
 */
export type CommandLine = readonly [string, ...string[]];

/**
 * Captured outcome of one formatter process.
 *
 * @property stdout Raw standard output bytes, compared byte-for-byte
 * @property stderr Standard error decoded as UTF-8
 * @property status Exit status; 128 + signal number when killed by a signal
 */
export interface CommandResult {
	readonly stdout: Buffer;
	readonly stderr: string;
	readonly status: number;
}

/**
 * Settings shared by every per-file check.
 */
export interface CheckSettings {
	readonly formatter: string;
	readonly verbose: boolean;
}

/**
 * Fully resolved options for one run.
 *
 * @property inputs Files or directories to scan, in the order given
 * @property jobs Upper bound on concurrently running formatter processes
 */
export interface FormatCheckOptions extends CheckSettings {
	readonly inputs: readonly string[];
	readonly jobs: number;
}
