// CHANGE: Specs for the command-line program: file options, flag overrides, exit codes
// INVARIANT: Flags override the build description; every error maps to exit code 1

import { Effect, Layer } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { program } from "../../src/app/program.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";
import { tempArgFileWriter } from "../../src/shell/invocation/argfiles.js";
import { fixedJavaRuntime } from "../../src/shell/runtime/java-runtime.js";
import { captureLogs } from "../utils/logs.js";
import { fakeCompiler, offlineRemote } from "../utils/services.js";
import { createTempProject, type TempProject } from "../utils/tempProject.js";

describe("program", () => {
	let project: TempProject;

	beforeEach(() => {
		project = createTempProject();
		project.file("src/main/java/com/acme/A.java", "class A {}");
		project.file(
			".m2/repository/org/checkerframework/checker/3.53.0/checker-3.53.0.jar",
		);
		project.file(
			"checker-build.json",
			JSON.stringify({
				project: {
					properties: { "maven.compiler.source": "17" },
					localRepository: ".m2/repository",
					remoteRepositories: [],
				},
				checker: {
					processors: ["org.checkerframework.checker.nullness.NullnessChecker"],
					procOnly: false,
				},
			}),
		);
	});

	afterEach(() => {
		project.cleanup();
	});

	const runProgram = (args: ReadonlyArray<string>, exitCode: number) => {
		const compiler = fakeCompiler(["A.java:1: error: boom"], exitCode);
		const logs = captureLogs();
		const services = Layer.mergeAll(
			compiler.layer,
			tempArgFileWriter(project.dir("tmp")),
			offlineRemote,
			fixedJavaRuntime("17"),
			logs.layer,
		);
		return Effect.runPromise(
			program(parseCLIArgs(args), project.root).pipe(Effect.provide(services)),
		).then((code) => ({ code, runs: compiler.runs, lines: logs.lines }));
	};

	it("exits 1 when the checker reports errors", async () => {
		const { code, lines } = await runProgram([], 1);
		expect(code).toBe(1);
		expect(lines[lines.length - 1]).toBe("[ERROR] Checker Framework found errors (exit code 1).");
	});

	it("lets flags override the build description", async () => {
		const { code, runs, lines } = await runProgram(["--no-fail-on-error", "--extra-arg", "-Awarns"], 1);
		expect(code).toBe(0);
		const command = runs[0]?.command ?? [];
		expect(command).not.toContain("-proc:only");
		expect(command[command.length - 2]).toBe("-Awarns");
		expect(lines[lines.length - 1]).toBe(
			"[INFO] Checker Framework reported errors (exit code 1); not failing the build.",
		);
	});

	it("exits 0 for a skipped run", async () => {
		const { code, runs, lines } = await runProgram(["--skip"], 0);
		expect(code).toBe(0);
		expect(runs).toEqual([]);
		expect(lines).toEqual(["[INFO] Execution is skipped", "[INFO] Skipped (skip-flag)."]);
	});

	it("reports command-line errors", async () => {
		const { code, lines } = await runProgram(["--bogus"], 0);
		expect(code).toBe(1);
		expect(lines).toEqual(["[ERROR] Configuration error: unknown option '--bogus'"]);
	});

	it("reports a missing explicit build description", async () => {
		const { code, lines } = await runProgram(["absent.json"], 0);
		expect(code).toBe(1);
		expect(lines[0]?.startsWith("[ERROR] Configuration error: ENOENT")).toBe(true);
	});
});
