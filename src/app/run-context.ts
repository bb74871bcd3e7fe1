// CHANGE: Gather every per-run decision into one immutable RunContext
// PURITY: APP (composes CORE decisions with SHELL lookups)
// EFFECT: Effect<RunContext | Skip, VersionRequirementError | FSError, JavaRuntimeProbe | RemoteRepository>
// INVARIANT: Versions, artifacts and Lombok state are sampled once and only read afterwards
// COMPLEXITY: O(f + t) where f = scanned files, t = resolution attempts

import { Effect } from "effect";

import {
	type CompatibilityDecision,
	decideCompatibility,
	type VersionPair,
} from "../core/compat/rules.js";
import type { FSError, VersionRequirementError } from "../core/errors.js";
import { type LombokState, mergeSuppression } from "../core/lombok/lombok.js";
import type { SkipReason } from "../core/models.js";
import { effectiveSourceRoots, includePatterns } from "../core/sources/source-set.js";
import type { BuildContext, CheckerOptions } from "../core/types/index.js";
import {
	effectiveCheckerVersion,
	parseCheckerVersion,
} from "../core/version/checker-version.js";
import {
	type RequiredArtifacts,
	resolveRequiredArtifacts,
} from "../shell/artifacts/checker-artifacts.js";
import type { RemoteRepository } from "../shell/artifacts/remote.js";
import { makeArtifactResolver, standardTiers } from "../shell/artifacts/resolver.js";
import { detectLombok } from "../shell/lombok/integration.js";
import type { JavaRuntimeProbe } from "../shell/runtime/java-runtime.js";
import { scanSources } from "../shell/sources/scan.js";
import { detectVersions } from "../shell/version/detector.js";

/**
 * Everything one run decided, threaded explicitly through planning and execution.
 */
export interface RunContext {
	readonly build: BuildContext;
	readonly options: CheckerOptions;
	readonly versions: VersionPair;
	readonly checkerVersion: string;
	readonly compatibility: CompatibilityDecision;
	readonly lombok: LombokState;
	readonly sourceFiles: ReadonlyArray<string>;
	readonly artifacts: RequiredArtifacts;
	readonly extraArgs: ReadonlyArray<string>;
}

export interface Skip {
	readonly _tag: "Skip";
	readonly reason: SkipReason;
}

const skip = (reason: SkipReason): Skip => ({ _tag: "Skip", reason });

/**
 * Reasons to skip before any work is done.
 *
 * @pure false (logs)
 */
function preconditions(
	build: BuildContext,
	options: CheckerOptions,
): Effect.Effect<Skip | null> {
	return Effect.gen(function* () {
		if (options.skip) {
			yield* Effect.logInfo("Execution is skipped");
			return skip("skip-flag");
		}
		if (build.packaging === "pom") {
			yield* Effect.logInfo("Execution is skipped for project with packaging 'pom'");
			return skip("aggregator-packaging");
		}
		if (options.processors.length === 0) {
			yield* Effect.logWarning("Skipping Checker Framework: No checkers configured.");
			return skip("no-processors");
		}
		return null;
	});
}

/**
 * Extra compiler arguments with the Lombok suppression merged in when enabled.
 *
 * @pure true
 */
export function effectiveExtraArgs(
	options: Pick<CheckerOptions, "extraArgs" | "suppressLombokWarnings">,
	lombok: LombokState,
): ReadonlyArray<string> {
	return lombok.isUsed && options.suppressLombokWarnings
		? mergeSuppression(options.extraArgs)
		: options.extraArgs;
}

/**
 * Resolve versions, Lombok state, sources and artifacts for a run.
 *
 * @effect Effect<RunContext | Skip, VersionRequirementError | FSError, JavaRuntimeProbe | RemoteRepository>
 */
export function prepareRun(
	build: BuildContext,
	options: CheckerOptions,
): Effect.Effect<
	RunContext | Skip,
	VersionRequirementError | FSError,
	JavaRuntimeProbe | RemoteRepository
> {
	return Effect.gen(function* () {
		const skipped = yield* preconditions(build, options);
		if (skipped !== null) return skipped;

		yield* Effect.logInfo(`Running processor(s): ${options.processors.join(",")}`);

		const versions = yield* detectVersions(build);
		const checkerVersion = effectiveCheckerVersion(options.checkerVersion, build.dependencies);
		yield* Effect.logInfo(
			`Starting Checker Framework analysis with version: ${checkerVersion}`,
		);
		const compatibility = decideCompatibility(
			versions,
			parseCheckerVersion(checkerVersion),
		);
		yield* Effect.logDebug(
			`Compatibility: alternate javac=${compatibility.needsAlternateFrontend}, annotated JDK=${compatibility.needsAnnotatedStdlib}, module flags=${compatibility.needsModuleVisibilityFlags}`,
		);

		const lombok = yield* detectLombok(build, options);
		const roots = effectiveSourceRoots(build, options, lombok);
		const sourceFiles = yield* scanSources(roots, {
			includes: includePatterns(options),
			excludes: options.excludes,
		});
		if (sourceFiles.length === 0) {
			yield* Effect.logInfo("No source files found to check.");
			return skip("no-sources");
		}

		const resolver = yield* makeArtifactResolver(yield* standardTiers(build, options));
		const artifacts = yield* resolveRequiredArtifacts(resolver, checkerVersion, compatibility);

		return {
			build,
			options,
			versions,
			checkerVersion,
			compatibility,
			lombok,
			sourceFiles,
			artifacts,
			extraArgs: effectiveExtraArgs(options, lombok),
		};
	});
}
