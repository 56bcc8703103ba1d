import { describe, expect, it } from "vitest";

import {
	ArgumentError,
	ConfigurationError,
	DiscoveryError,
	describeError,
	errorDetail,
	FileReadError,
	ToolLaunchError,
} from "../../src/core/errors.js";

describe("describeError", () => {
	it("returns the argument error detail unchanged", (): void => {
		const error = new ArgumentError({ detail: "Unknown option -x" });
		expect(describeError(error)).toBe("Unknown option -x");
	});

	it("names a missing input path", (): void => {
		const error = new DiscoveryError({
			path: "src",
			reason: "NotFound",
			detail: "no such file or directory",
		});
		expect(describeError(error)).toBe("Input path not found: src");
	});

	it("includes the detail of an unreadable tree", (): void => {
		const error = new DiscoveryError({
			path: "src",
			reason: "Unreadable",
			detail: "EACCES",
		});
		expect(describeError(error)).toBe("Unable to scan src: EACCES");
	});

	it("describes read, launch and configuration failures", (): void => {
		const read = new FileReadError({ path: "a.cpp", detail: "EISDIR" });
		const launch = new ToolLaunchError({
			command: "clang-format a.cpp",
			reason: "spawn clang-format ENOENT",
		});
		const config = new ConfigurationError({ detail: "bad jobs" });

		expect(describeError(read)).toBe(
			"Unable to open src file a.cpp: EISDIR",
		);
		expect(describeError(launch)).toBe(
			"Unable to run clang-format a.cpp: spawn clang-format ENOENT",
		);
		expect(describeError(config)).toBe("Invalid configuration: bad jobs");
	});
});

describe("errorDetail", () => {
	it("prefers the message of Error instances", (): void => {
		expect(errorDetail(new Error("boom"))).toBe("boom");
		expect(errorDetail("plain")).toBe("plain");
	});
});
