// CHANGE: Unit tests for CLI argument parsing

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../../src/shell/config/index.js";
import { parseCLIArgs } from "../../../src/shell/config/index.js";

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

const parsed = (args: readonly string[]): CLIOptions =>
	Either.getOrThrow(parseCLIArgs(args));

const errorOf = (args: readonly string[]): string =>
	Either.match(parseCLIArgs(args), {
		onLeft: (e) => e.detail,
		onRight: () => "",
	});

describe("parseCLIArgs: defaults and positional", () => {
	it("reads process.argv when no arguments are passed", () => {
		const opts = withArgv([], () => Either.getOrThrow(parseCLIArgs()));
		expect(opts).toEqual({ overrides: {}, debug: false });
	});

	it("takes a single positional as the build description", () => {
		expect(parsed(["app/checker-build.json"]).configFile).toBe("app/checker-build.json");
		expect(parsed(["--config", "b.json"]).configFile).toBe("b.json");
	});

	it("rejects a second positional", () => {
		expect(errorOf(["a.json", "b.json"])).toBe("unexpected argument 'b.json'");
	});

	it("ignores empty string arguments", () => {
		expect(parsed(["", "--offline"]).overrides).toEqual({ offline: true });
	});
});

describe("parseCLIArgs: value flags", () => {
	it("accumulates processors across flags and comma lists", () => {
		const opts = parsed(["--processor", "a.Nullness, b.Interning", "--processor=c.Lock"]);
		expect(opts.overrides.processors).toEqual(["a.Nullness", "b.Interning", "c.Lock"]);
	});

	it("keeps extra arguments verbatim, including commas and leading dashes", () => {
		const opts = parsed(["--extra-arg", "-AsuppressWarnings=a,b", "--extra-arg=-Awarns"]);
		expect(opts.overrides.extraArgs).toEqual(["-AsuppressWarnings=a,b", "-Awarns"]);
	});

	it("sets single-valued options", () => {
		const opts = parsed([
			"--checker-version",
			"3.42.0",
			"--executable=/opt/jdk/bin/java",
			"--include",
			"com/**/*.java",
			"--exclude",
			"**/gen/**",
		]);
		expect(opts.overrides).toEqual({
			checkerVersion: "3.42.0",
			executable: "/opt/jdk/bin/java",
			includes: ["com/**/*.java"],
			excludes: ["**/gen/**"],
		});
	});

	it("requires a value", () => {
		expect(errorOf(["--checker-version"])).toBe("option '--checker-version' requires a value");
	});
});

describe("parseCLIArgs: boolean flags", () => {
	it("maps every switch onto its option", () => {
		const opts = parsed([
			"--skip",
			"--no-proc-only",
			"--no-fail-on-error",
			"--exclude-tests",
			"--no-suppress-lombok-warnings",
			"--offline",
			"--debug",
		]);
		expect(opts).toEqual({
			debug: true,
			overrides: {
				skip: true,
				procOnly: false,
				failOnError: false,
				excludeTests: true,
				suppressLombokWarnings: false,
				offline: true,
			},
		});
	});

	it("rejects values on switches and unknown options", () => {
		expect(errorOf(["--offline=yes"])).toBe("option '--offline' takes no value");
		expect(errorOf(["--max-clones", "3"])).toBe("unknown option '--max-clones'");
	});
});
