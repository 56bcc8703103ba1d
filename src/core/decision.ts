// CHANGE: Pure decision function mapping the aggregate state to an exit code
// WHY: Centralize termination logic in the Functional Core
// FORMAT THEOREM: ∀s ∈ State: s.needsFormatting ↔ computeExitCode(s) = 2
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";

/**
 * Computes the process exit code from the aggregate state.
 *
 * @param state - Flags computed once every file was checked
 * @returns 2 if any file needs formatting; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0, 2}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode({ needsFormatting: true }); // => 2
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.needsFormatting,
		(needsFormatting): ExitCode => (needsFormatting ? 2 : 0),
	);
