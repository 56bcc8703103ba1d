// CHANGE: Iterative source discovery over input paths
// WHY: An explicit work-list keeps deep trees off the call stack
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<readonly string[], DiscoveryError>
// INVARIANT: ∀ f ∈ result: isFile(f) ∧ hasSourceExtension(f)
// INVARIANT: each reachable path is visited once per root (no symlink cycles)
// COMPLEXITY: O(n) where n = number of entries under root

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { DiscoveryError, errorDetail } from "../../core/errors.js";
import { hasSourceExtension } from "../../core/extensions.js";

function walk(root: string): string[] {
	const found: string[] = [];
	const pending: string[] = [root];

	for (
		let current = pending.pop();
		current !== undefined;
		current = pending.pop()
	) {
		// Follows symlinks; a dangling entry has no stat and is skipped
		const stat = fs.statSync(current, { throwIfNoEntry: false });
		if (stat === undefined) continue;

		if (stat.isDirectory()) {
			for (const name of fs.readdirSync(current)) {
				pending.push(path.join(current, name));
			}
		} else if (stat.isFile() && hasSourceExtension(current)) {
			found.push(current);
		}
	}

	return found;
}

/**
 * Lists source files reachable under one root (a file or a directory).
 *
 * @param root Input path as given on the command line
 * @returns Files in work-list order; no order is promised
 *
 * @pure false (filesystem reads)
 * @effect Effect<readonly string[], DiscoveryError>
 */
export function listSourceFiles(
	root: string,
): Effect.Effect<readonly string[], DiscoveryError> {
	return Effect.gen(function* () {
		const unreadable = (error: unknown): DiscoveryError =>
			new DiscoveryError({
				path: root,
				reason: "Unreadable",
				detail: errorDetail(error),
			});

		const rootStat = yield* Effect.try({
			try: () => fs.statSync(root, { throwIfNoEntry: false }),
			catch: unreadable,
		});
		if (rootStat === undefined) {
			return yield* Effect.fail(
				new DiscoveryError({
					path: root,
					reason: "NotFound",
					detail: "no such file or directory",
				}),
			);
		}

		return yield* Effect.try({
			try: () => walk(root),
			catch: unreadable,
		});
	});
}

/**
 * Concatenates the discovery results of every input, inputs in order.
 *
 * @effect Effect<readonly string[], DiscoveryError>
 */
export function discoverSourceFiles(
	inputs: readonly string[],
): Effect.Effect<readonly string[], DiscoveryError> {
	return Effect.forEach(inputs, (input) => listSourceFiles(input)).pipe(
		Effect.map((lists) => lists.flat()),
	);
}
