// CHANGE: Sample Lombok usage and delombok output directories once per run
// PURITY: SHELL (filesystem existence checks, logging)
// EFFECT: Effect<LombokState, never, never>
// INVARIANT: Returned directories existed at sampling time
// COMPLEXITY: O(d + p) where d = |dependencies|, p = |plugins|

import * as fs from "node:fs";

import { Effect, Option } from "effect";

import {
	delombokOutputExpression,
	findLombokPlugin,
	hasBuilderSensitiveChecker,
	isLombokUsed,
	LOMBOK_UNUSED,
	type LombokState,
	resolveBuildPath,
	testDelombokOutputExpression,
} from "../../core/lombok/lombok.js";
import type { BuildContext, CheckerOptions } from "../../core/types/index.js";

const isDirectory = (dir: string): boolean =>
	fs.statSync(dir, { throwIfNoEntry: false })?.isDirectory() ?? false;

const existingDir = (dir: Option.Option<string>): Option.Option<string> =>
	Option.filter(dir, isDirectory);

/**
 * Detect Lombok and locate its delombok output.
 *
 * @effect Effect<LombokState>
 */
export function detectLombok(
	ctx: BuildContext,
	options: Pick<CheckerOptions, "processors">,
): Effect.Effect<LombokState> {
	return Effect.gen(function* () {
		if (!isLombokUsed(ctx)) return LOMBOK_UNUSED;

		yield* Effect.logInfo("Lombok detected in project. Checking for delombok output directory.");
		if (hasBuilderSensitiveChecker(options.processors)) {
			yield* Effect.logWarning(
				"The Object Construction or Called Methods Checker was enabled together with Lombok. " +
					"Ensure that your lombok.config file contains 'lombok.addLombokGeneratedAnnotation = true', " +
					"or all warnings related to misuse of Lombok builders will be disabled.",
			);
		}

		const plugin = findLombokPlugin(ctx.plugins);
		const configured = Option.map(
			Option.flatMap(plugin, delombokOutputExpression),
			(expression) => resolveBuildPath(expression, ctx),
		);
		const testConfigured = Option.map(plugin, (p) =>
			resolveBuildPath(testDelombokOutputExpression(p), ctx),
		);

		const deLombokOutputDir = existingDir(configured);
		const testDeLombokOutputDir = existingDir(testConfigured);

		if (Option.isSome(deLombokOutputDir)) {
			yield* Effect.logInfo(`Found delombok output directory: ${deLombokOutputDir.value}`);
			yield* Effect.logInfo(
				"Note: Make sure delombok is configured to generate @Generated annotations.",
			);
		} else {
			yield* Effect.logWarning(
				"Lombok is detected but delombok output directory not found. " +
					"The Checker Framework will check original source files, which may contain Lombok annotations.",
			);
		}
		if (Option.isSome(testDeLombokOutputDir)) {
			yield* Effect.logInfo(
				`Found test delombok output directory: ${testDeLombokOutputDir.value}`,
			);
		}

		return { isUsed: true, deLombokOutputDir, testDeLombokOutputDir };
	});
}
