// CHANGE: Assemble the compiler invocation from a RunContext
// PURITY: APP (writes scoped argument files through ArgFileWriter)
// EFFECT: Effect<InvocationPlan, FSError, ArgFileWriter | Scope>
// INVARIANT: Token order is fixed by SECTION_ORDER; argument files live as long as the scope
// COMPLEXITY: O(n) where n = classpath elements + source files

import * as path from "node:path";

import { Effect, Option, type Scope } from "effect";

import { moduleVisibilityTokens } from "../core/compat/rules.js";
import type { FSError } from "../core/errors.js";
import { classpathArgFile, sourceListArgFile } from "../core/invocation/render.js";
import { InvocationBuilder, type InvocationPlan } from "../core/invocation/sections.js";
import { processorPathValue } from "../shell/artifacts/checker-artifacts.js";
import { ArgFileWriter } from "../shell/invocation/argfiles.js";
import { executablePath, isLauncher } from "../shell/runtime/executable.js";
import type { RunContext } from "./run-context.js";

/** Main class of javac when started through the `java` launcher. */
export const JAVAC_MAIN = "com.sun.tools.javac.Main";

const BOOTCLASSPATH_PREPEND = "-Xbootclasspath/p:";

const optionalTokens = (
	value: Option.Option<string>,
	toTokens: (v: string) => ReadonlyArray<string>,
): ReadonlyArray<string> => Option.match(value, { onNone: () => [], onSome: toTokens });

/**
 * Build the ordered argument list for a run.
 *
 * In `javac` mode, JVM-level flags carry the `-J` prefix; with the `java`
 * launcher they are passed directly and the launcher gets a classpath and
 * javac's main class.
 *
 * @effect Effect<InvocationPlan, FSError, ArgFileWriter | Scope>
 */
export function plan(
	run: RunContext,
): Effect.Effect<InvocationPlan, FSError, ArgFileWriter | Scope.Scope> {
	return Effect.gen(function* () {
		const writer = yield* ArgFileWriter;
		const executable = executablePath(run.options.executable, run.build.toolchain);
		const launcher = isLauncher(executable);
		const jvm = launcher ? "" : "-J";
		const processorPath = processorPathValue(run.artifacts.processorPath);

		const classpathReference =
			run.build.classpathElements.length > 0
				? [
						yield* writer.write(
							"checker-classpath",
							classpathArgFile(run.build.classpathElements, path.delimiter),
						),
					]
				: [];
		const sourceReference = yield* writer.write(
			"checker-sources",
			sourceListArgFile(run.sourceFiles),
		);

		return InvocationBuilder.start(executable)
			.with(
				"moduleVisibility",
				run.compatibility.needsModuleVisibilityFlags ? moduleVisibilityTokens(jvm) : [],
			)
			.with(
				"alternateFrontend",
				optionalTokens(run.artifacts.alternateFrontend, (jar) => [
					`${jvm}${BOOTCLASSPATH_PREPEND}${jar}`,
				]),
			)
			.with(
				"launcherClasspath",
				launcher ? optionalTokens(processorPath, (cp) => ["-classpath", cp]) : [],
			)
			.with("mainEntry", launcher ? [JAVAC_MAIN] : [])
			.with("classpathReference", classpathReference)
			.with(
				"annotatedStdlib",
				optionalTokens(run.artifacts.annotatedStdlib, (jar) => [
					`${BOOTCLASSPATH_PREPEND}${jar}`,
				]),
			)
			.with(
				"processorPath",
				optionalTokens(processorPath, (pp) => ["-processorpath", pp]),
			)
			.with("processorSelector", ["-processor", run.options.processors.join(",")])
			.with("processingMode", run.options.procOnly ? ["-proc:only"] : [])
			.with("extraArguments", run.extraArgs)
			.with("sourceReference", [sourceReference])
			.build();
	});
}
