// CHANGE: Resolve the build's source version and the executing runtime's version once per run
// PURITY: SHELL (may probe the Java runtime)
// EFFECT: Effect<VersionPair, VersionRequirementError, JavaRuntimeProbe>
// INVARIANT: Result satisfies sourceVersion ≥ 8 ∧ runtimeVersion ≥ 8
// COMPLEXITY: O(1)

import { Effect, Option } from "effect";

import type { VersionPair } from "../../core/compat/rules.js";
import { VersionRequirementError } from "../../core/errors.js";
import type { BuildContext } from "../../core/types/index.js";
import {
	configuredSourceVersion,
	javaMajor,
	MINIMUM_JAVA_VERSION,
} from "../../core/version/java-version.js";
import { JavaRuntimeProbe } from "../runtime/java-runtime.js";

/**
 * Raw runtime version: the toolchain's declared version, else the version
 * the host reported, else a probe of the local Java runtime.
 */
export function rawRuntimeVersion(
	ctx: Pick<BuildContext, "toolchain" | "runtimeJavaVersion">,
): Effect.Effect<Option.Option<string>, never, JavaRuntimeProbe> {
	const declared = Option.flatMap(ctx.toolchain, (tc) => tc.version);
	if (Option.isSome(declared)) return Effect.succeed(declared);
	if (Option.isSome(ctx.runtimeJavaVersion)) {
		return Effect.succeed(ctx.runtimeJavaVersion);
	}
	return Effect.flatMap(JavaRuntimeProbe, (probe) => probe.javaVersion);
}

/** @pure true */
const requireAtLeast8 = (
	subject: "source" | "runtime",
	raw: string,
	version: number,
): Effect.Effect<number, VersionRequirementError> =>
	version >= MINIMUM_JAVA_VERSION
		? Effect.succeed(version)
		: Effect.fail(new VersionRequirementError({ subject, raw, version }));

/**
 * Determine the VersionPair for a run.
 *
 * An unset source version falls back to the runtime version (javac's own
 * default); an unparseable or pre-8 value is fatal.
 *
 * @effect Effect<VersionPair, VersionRequirementError, JavaRuntimeProbe>
 * @postcondition both versions ≥ 8
 */
export function detectVersions(
	ctx: BuildContext,
): Effect.Effect<VersionPair, VersionRequirementError, JavaRuntimeProbe> {
	return Effect.gen(function* () {
		const runtimeRaw = Option.getOrElse(yield* rawRuntimeVersion(ctx), () => "");
		const runtimeVersion = yield* requireAtLeast8(
			"runtime",
			runtimeRaw,
			javaMajor(runtimeRaw),
		);

		const sourceRaw = configuredSourceVersion(ctx);
		if (sourceRaw === undefined) {
			yield* Effect.logWarning(
				`No maven.compiler.source or maven.compiler.target configured; assuming source version ${runtimeVersion}.`,
			);
			return { sourceVersion: runtimeVersion, runtimeVersion };
		}
		const sourceVersion = yield* requireAtLeast8(
			"source",
			sourceRaw,
			javaMajor(sourceRaw),
		);

		yield* Effect.logDebug(
			`Java source version ${sourceVersion} (${sourceRaw}), runtime version ${runtimeVersion} (${runtimeRaw})`,
		);
		return { sourceVersion, runtimeVersion };
	});
}
