// CHANGE: Resolve every artifact the decided compatibility branch needs
// PURITY: SHELL (delegates to ArtifactResolver)
// EFFECT: Effect<RequiredArtifacts, never, never>
// INVARIANT: Missing artifacts are reported, never fatal; the compiler run surfaces the consequence
// COMPLEXITY: O(k) resolutions, k ≤ 4

import * as path from "node:path";

import { Effect, Option } from "effect";

import type { ResolvedArtifact } from "../../core/artifacts/coordinates.js";
import { formatCoordinates } from "../../core/artifacts/coordinates.js";
import {
	ALTERNATE_FRONTEND,
	annotatedStdlibCoordinates,
	type CompatibilityDecision,
} from "../../core/compat/rules.js";
import type { ArtifactCoordinates } from "../../core/types/index.js";
import { CHECKER_GROUP_ID } from "../../core/version/checker-version.js";
import type { ArtifactResolver } from "./resolver.js";

/**
 * Processor path made of the checker and checker-qual jars.
 *
 * `Degraded` keeps the run going with what was found.
 */
export type ProcessorPath =
	| { readonly _tag: "Complete"; readonly entries: ReadonlyArray<string> }
	| {
			readonly _tag: "Degraded";
			readonly entries: ReadonlyArray<string>;
			readonly missing: ReadonlyArray<string>;
	  }
	| { readonly _tag: "Absent" };

export interface RequiredArtifacts {
	readonly checker: ResolvedArtifact;
	readonly checkerQual: ResolvedArtifact;
	readonly processorPath: ProcessorPath;
	readonly alternateFrontend: Option.Option<string>;
	readonly annotatedStdlib: Option.Option<string>;
}

export const checkerCoordinates = (
	artifactId: "checker" | "checker-qual",
	version: string,
): ArtifactCoordinates => ({ groupId: CHECKER_GROUP_ID, artifactId, version });

/**
 * Combine the checker and checker-qual lookups into a processor path.
 *
 * @pure true
 */
export function toProcessorPath(
	checker: ResolvedArtifact,
	checkerQual: ResolvedArtifact,
): ProcessorPath {
	if (Option.isNone(checker.file)) return { _tag: "Absent" };
	if (Option.isNone(checkerQual.file)) {
		return {
			_tag: "Degraded",
			entries: [checker.file.value],
			missing: [formatCoordinates(checkerQual)],
		};
	}
	return { _tag: "Complete", entries: [checker.file.value, checkerQual.file.value] };
}

/** `entries` joined with the platform path separator, or None when absent. */
export const processorPathValue = (p: ProcessorPath): Option.Option<string> =>
	p._tag === "Absent" ? Option.none() : Option.some(p.entries.join(path.delimiter));

const optionalOverlay = (
	resolver: ArtifactResolver,
	needed: boolean,
	coordinates: ArtifactCoordinates,
	purpose: string,
): Effect.Effect<Option.Option<string>> => {
	if (!needed) return Effect.succeed(Option.none());
	return Effect.gen(function* () {
		const resolved = yield* resolver.resolve(coordinates);
		if (Option.isNone(resolved.file)) {
			yield* Effect.logWarning(
				`${purpose} ${formatCoordinates(coordinates)} is required for this Java version but could not be found; the compiler may fail.`,
			);
		}
		return resolved.file;
	});
};

/**
 * Resolve the checker jars and any overlay the compatibility decision demands.
 *
 * @effect Effect<RequiredArtifacts>
 */
export function resolveRequiredArtifacts(
	resolver: ArtifactResolver,
	checkerVersion: string,
	decision: CompatibilityDecision,
): Effect.Effect<RequiredArtifacts> {
	return Effect.gen(function* () {
		const checker = yield* resolver.resolve(checkerCoordinates("checker", checkerVersion));
		const checkerQual = yield* resolver.resolve(
			checkerCoordinates("checker-qual", checkerVersion),
		);
		const processorPath = toProcessorPath(checker, checkerQual);

		if (processorPath._tag === "Degraded") {
			yield* Effect.logWarning(
				`Only found checker jar, ${processorPath.missing.join(", ")} is missing. Some classes may not be found.`,
			);
		} else if (processorPath._tag === "Absent") {
			yield* Effect.logWarning(
				"Could not find Checker Framework JAR. Trying to use classpath instead.",
			);
		}

		const alternateFrontend = yield* optionalOverlay(
			resolver,
			decision.needsAlternateFrontend,
			ALTERNATE_FRONTEND,
			"Alternate javac",
		);
		const annotatedStdlib = yield* optionalOverlay(
			resolver,
			decision.needsAnnotatedStdlib,
			annotatedStdlibCoordinates(checkerVersion),
			"Annotated JDK",
		);

		return { checker, checkerQual, processorPath, alternateFrontend, annotatedStdlib };
	});
}
