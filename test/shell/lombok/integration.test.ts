// CHANGE: Specs for Lombok detection against real directories
// INVARIANT: Output directories are reported only when they exist

import * as path from "node:path";

import { Effect, Option } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { detectLombok } from "../../../src/shell/lombok/integration.js";
import { artifact, buildContext, execution, lombokPlugin } from "../../utils/builders.js";
import { captureLogs } from "../../utils/logs.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

const nullness = { processors: ["org.checkerframework.checker.nullness.NullnessChecker"] };

describe("detectLombok", () => {
	let project: TempProject;

	beforeEach(() => {
		project = createTempProject();
	});

	afterEach(() => {
		project.cleanup();
	});

	it("reports nothing for projects without Lombok", () => {
		const state = Effect.runSync(detectLombok(buildContext(project.root), nullness));
		expect(state.isUsed).toBe(false);
	});

	it("finds configured and conventional delombok output", () => {
		const main = project.dir("target/delombok");
		const test = project.dir("target/generated-test-sources/delombok");
		const ctx = buildContext(project.root, {
			plugins: [
				lombokPlugin({}, [
					execution("delombok", ["delombok"], {
						outputDirectory: "${project.build.directory}/delombok",
					}),
				]),
			],
		});

		const state = Effect.runSync(detectLombok(ctx, nullness));

		expect(state).toEqual({
			isUsed: true,
			deLombokOutputDir: Option.some(main),
			testDeLombokOutputDir: Option.some(test),
		});
	});

	it("warns when the dependency is present but no output exists", () => {
		const ctx = buildContext(project.root, {
			dependencies: [artifact("org.projectlombok", "lombok", "1.18.30")],
		});
		const logs = captureLogs();

		const state = Effect.runSync(detectLombok(ctx, nullness).pipe(Effect.provide(logs.layer)));

		expect(state.isUsed).toBe(true);
		expect(Option.isNone(state.deLombokOutputDir)).toBe(true);
		expect(Option.isNone(state.testDeLombokOutputDir)).toBe(true);
		expect(logs.lines).toEqual([
			"[INFO] Lombok detected in project. Checking for delombok output directory.",
			"[WARNING] Lombok is detected but delombok output directory not found. The Checker Framework will check original source files, which may contain Lombok annotations.",
		]);
	});

	it("warns about builder-sensitive checkers", () => {
		const ctx = buildContext(project.root, { plugins: [lombokPlugin()] });
		const logs = captureLogs();

		Effect.runSync(
			detectLombok(ctx, {
				processors: ["org.checkerframework.checker.calledmethods.CalledMethodsChecker"],
			}).pipe(Effect.provide(logs.layer)),
		);

		expect(logs.lines[1]?.startsWith("[WARNING] The Object Construction or Called Methods Checker")).toBe(true);
	});

	it("ignores a configured directory that does not exist", () => {
		const ctx = buildContext(project.root, {
			plugins: [lombokPlugin({ outputDirectory: path.join(project.root, "missing") })],
		});
		const state = Effect.runSync(detectLombok(ctx, nullness));
		expect(Option.isNone(state.deLombokOutputDir)).toBe(true);
	});
});
