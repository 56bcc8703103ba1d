#!/usr/bin/env node

// CHANGE: Executable entry of the format gate
// WHY: CI reads 0 (clean), 2 (needs formatting) or 1 (misuse, fatal) from here
// PURITY: SHELL (hands main()'s code to the OS)
// INVARIANT: the only process.exit in the tree

import { main } from "../main.js";

void (async (): Promise<void> => {
	try {
		const code = await main(process.argv.slice(2));
		process.exit(code);
	} catch (error) {
		// Defects only: typed failures are mapped to exit codes inside main()
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
