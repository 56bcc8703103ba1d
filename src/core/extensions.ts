// CHANGE: Source extension allow-list for discovery
// WHY: Discovery keeps only C++ sources and headers
// PURITY: CORE
// COMPLEXITY: O(1) per lookup

import * as path from "node:path";

/**
 * Extensions checked by default, compared case-sensitively.
 */
export const SOURCE_EXTENSIONS: ReadonlySet<string> = new Set([".cpp", ".h"]);

/**
 * Tells whether the path ends in one of the allowed extensions.
 *
 * @pure true
 * @invariant extname(p) = "" → false (dotfiles such as ".h" have no extension)
 */
export function hasSourceExtension(
	filePath: string,
	extensions: ReadonlySet<string> = SOURCE_EXTENSIONS,
): boolean {
	const ext = path.extname(filePath);
	return ext.length > 0 && extensions.has(ext);
}
