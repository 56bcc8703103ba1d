import { Effect, Exit } from "effect";
import { describe, expect, it } from "vitest";

import { runCommand, toExitStatus } from "../../../src/shell/utils/exec.js";

describe("runCommand", () => {
	it("captures stdout bytes exactly, including CR and a missing final newline", async (): Promise<void> => {
		const result = await Effect.runPromise(
			runCommand(["/bin/sh", "-c", "printf 'a\\r\\nb'"]),
		);
		expect(result.stdout.equals(Buffer.from("a\r\nb"))).toBe(true);
		expect(result.status).toBe(0);
	});

	it("returns a nonzero exit status as a result, not an error", async (): Promise<void> => {
		const result = await Effect.runPromise(runCommand(["/bin/sh", "-c", "exit 7"]));
		expect(result.status).toBe(7);
	});

	it("captures stderr separately", async (): Promise<void> => {
		const result = await Effect.runPromise(
			runCommand(["/bin/sh", "-c", "echo out; echo oops >&2"]),
		);
		expect(result.stdout.toString("utf8")).toBe("out\n");
		expect(result.stderr).toBe("oops\n");
	});

	it("passes arguments containing spaces as single tokens", async (): Promise<void> => {
		const result = await Effect.runPromise(
			runCommand(["/bin/sh", "-c", 'printf %s "$0"', "my file.cpp"]),
		);
		expect(result.stdout.toString("utf8")).toBe("my file.cpp");
	});

	it("maps death by signal to 128 + signal number", async (): Promise<void> => {
		const result = await Effect.runPromise(
			runCommand(["/bin/sh", "-c", "kill -TERM $$"]),
		);
		expect(result.status).toBe(143);
	});

	it("fails with ToolLaunchError when the executable does not exist", async (): Promise<void> => {
		const error = await Effect.runPromise(
			Effect.flip(runCommand(["/definitely/not/a/formatter", "a.cpp"])),
		);
		expect(error._tag).toBe("ToolLaunchError");
		expect(error.command).toBe("/definitely/not/a/formatter a.cpp");
		expect(error.reason).toContain("ENOENT");
	});

	it("fails with ToolLaunchError for an empty executable name", async (): Promise<void> => {
		const error = await Effect.runPromise(Effect.flip(runCommand(["", "a.cpp"])));
		expect(error._tag).toBe("ToolLaunchError");
		expect(error.command).toBe('"" a.cpp');
	});

	it("kills the child when interrupted", async (): Promise<void> => {
		const started = Date.now();
		const exit = await Effect.runPromiseExit(
			runCommand(["/bin/sh", "-c", "exec sleep 10"]).pipe(
				Effect.timeout("100 millis"),
			),
		);
		expect(Exit.isFailure(exit)).toBe(true);
		expect(Date.now() - started).toBeLessThan(5000);
	});
});

describe("toExitStatus", () => {
	it("prefers the exit code", (): void => {
		expect(toExitStatus(0, null)).toBe(0);
		expect(toExitStatus(2, null)).toBe(2);
	});

	it("derives the status from the signal", (): void => {
		expect(toExitStatus(null, "SIGKILL")).toBe(137);
	});

	it("falls back to 1 when neither is known", (): void => {
		expect(toExitStatus(null, null)).toBe(1);
	});
});
