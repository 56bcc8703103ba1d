// CHANGE: Unit tests for getopt-style argument parsing
// WHY: Misuse must be detected before discovery; valid flags must round-trip deterministically

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	type CheckFlags,
	parseCLIArgs,
	renderUsage,
} from "../../src/shell/config/cli.js";

/**
 * Safely set process.argv for the duration of a test and restore afterwards.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

function flagsOf(args: readonly string[]): CheckFlags {
	const parsed = parseCLIArgs(args);
	if (Either.isLeft(parsed)) throw new Error(parsed.left.detail);
	if (parsed.right._tag !== "Check") throw new Error("expected a check command");
	return parsed.right.flags;
}

function failureOf(args: readonly string[]): string {
	const parsed = parseCLIArgs(args);
	if (Either.isRight(parsed)) throw new Error("expected an argument error");
	return parsed.left.detail;
}

describe("parseCLIArgs: inputs", () => {
	it("returns defaults for a single input", (): void => {
		expect(flagsOf(["src"])).toEqual({
			formatter: undefined,
			jobs: undefined,
			verbose: false,
			inputs: ["src"],
		});
	});

	it("reads process.argv when no arguments are passed", (): void => {
		const flags = withArgv(["include"], () => parseCLIArgs());
		expect(Either.getOrThrow(flags)).toEqual({
			_tag: "Check",
			flags: { formatter: undefined, jobs: undefined, verbose: false, inputs: ["include"] },
		});
	});

	it("keeps several inputs in order, interleaved with options", (): void => {
		const flags = flagsOf(["src", "-c", "clang-format-17", "include", "test"]);
		expect(flags.inputs).toEqual(["src", "include", "test"]);
		expect(flags.formatter).toBe("clang-format-17");
	});

	it("ignores empty string arguments", (): void => {
		expect(flagsOf(["", "src"]).inputs).toEqual(["src"]);
	});

	it("treats a lone dash and everything after -- as inputs", (): void => {
		expect(flagsOf(["-", "--", "-odd.cpp", "--help"]).inputs).toEqual([
			"-",
			"-odd.cpp",
			"--help",
		]);
	});

	it("requires at least one input", (): void => {
		expect(failureOf([])).toBe("No inputs given");
		expect(failureOf(["-v"])).toBe("No inputs given");
	});
});

describe("parseCLIArgs: --clang-format", () => {
	it.each([
		[["-c", "/opt/llvm/bin/clang-format", "src"]],
		[["--clang-format", "/opt/llvm/bin/clang-format", "src"]],
		[["--clang-format=/opt/llvm/bin/clang-format", "src"]],
		[["-c/opt/llvm/bin/clang-format", "src"]],
	])("accepts %j", (args): void => {
		const flags = flagsOf(args);
		expect(flags.formatter).toBe("/opt/llvm/bin/clang-format");
		expect(flags.inputs).toEqual(["src"]);
	});

	it("consumes the next token even when it starts with a dash", (): void => {
		expect(flagsOf(["-c", "-weird", "src"]).formatter).toBe("-weird");
	});

	it("fails when the value is missing", (): void => {
		expect(failureOf(["src", "-c"])).toBe("The option -c requires an argument");
		expect(failureOf(["src", "--clang-format"])).toBe(
			"The option --clang-format requires an argument",
		);
	});
});

describe("parseCLIArgs: --jobs", () => {
	it("parses a positive integer", (): void => {
		expect(flagsOf(["-j", "4", "src"]).jobs).toBe(4);
		expect(flagsOf(["--jobs=16", "src"]).jobs).toBe(16);
	});

	it("rejects zero and non-numeric values", (): void => {
		expect(failureOf(["-j", "0", "src"])).toBe(
			'The option -j expects a positive integer, got "0"',
		);
		expect(failureOf(["--jobs=many", "src"])).toBe(
			'The option --jobs expects a positive integer, got "many"',
		);
	});
});

describe("parseCLIArgs: boolean flags", () => {
	it("-v and --verbose enable verbose logging", (): void => {
		expect(flagsOf(["-v", "src"]).verbose).toBe(true);
		expect(flagsOf(["src", "--verbose"]).verbose).toBe(true);
	});

	it("-h requests help even without inputs", (): void => {
		expect(Either.getOrThrow(parseCLIArgs(["-h"]))).toEqual({ _tag: "Help" });
		expect(Either.getOrThrow(parseCLIArgs(["src", "--help"]))).toEqual({ _tag: "Help" });
	});

	it("rejects a value attached to a boolean flag", (): void => {
		expect(failureOf(["--verbose=yes", "src"])).toBe(
			"The option --verbose does not take an argument",
		);
		expect(failureOf(["-vx", "src"])).toBe("Unknown option -vx");
	});
});

describe("parseCLIArgs: unknown options", () => {
	it("reports the first unknown option", (): void => {
		expect(failureOf(["--bogus", "src"])).toBe("Unknown option --bogus");
		expect(failureOf(["src", "-x", "--bogus"])).toBe("Unknown option -x");
	});
});

describe("renderUsage", () => {
	it("starts with the usage line and lists the formatter option", (): void => {
		const lines = renderUsage().split("\n");
		expect(lines[0]).toBe("Usage: clang-format-check [options] <inputs...>");
		expect(lines).toContain(
			"  -c, --clang-format <path>    The clang-format executable to use (default: $CLANG_FORMAT or clang-format)",
		);
	});
});
