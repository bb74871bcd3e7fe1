// CHANGE: Decision tables mapping (source, runtime, checker version) to compiler overlays
// PURITY: CORE
// FORMAT THEOREM:
//   moduleFlags(v)       ⇔ v.runtime ≥ 9
//   alternateFrontend(v) ⇔ v.runtime = 8 ∧ v.source = 8 ∧ (cf ≥ 2.11 ∨ cf unparseable)
//   annotatedStdlib(v)   ⇔ v.runtime = 8 ∧ v.source = 8 ∧ (cf ≤ 3.3 ∧ cf parseable)
// INVARIANT: Deterministic, no I/O
// COMPLEXITY: O(1)

import { Option } from "effect";

import type { ArtifactCoordinates } from "../types/index.js";
import type { CheckerVersion } from "../version/checker-version.js";
import { CHECKER_GROUP_ID } from "../version/checker-version.js";

/**
 * Source and runtime major versions, resolved once per run.
 *
 * @invariant both ≥ 8 once the run is accepted
 */
export interface VersionPair {
	readonly sourceVersion: number;
	readonly runtimeVersion: number;
}

export interface CompatibilityDecision {
	readonly needsAlternateFrontend: boolean;
	readonly needsAnnotatedStdlib: boolean;
	readonly needsModuleVisibilityFlags: boolean;
}

const JAVAC_PACKAGES = [
	"api",
	"code",
	"file",
	"main",
	"model",
	"parser",
	"processing",
	"tree",
	"util",
] as const;

/** `--add-exports` directives exposing javac internals to the checker. */
export const MODULE_EXPORTS: ReadonlyArray<string> = JAVAC_PACKAGES.map(
	(pkg) => `--add-exports=jdk.compiler/com.sun.tools.javac.${pkg}=ALL-UNNAMED`,
);

/** The single `--add-opens` directive the checker needs. */
export const MODULE_OPENS =
	"--add-opens=jdk.compiler/com.sun.tools.javac.comp=ALL-UNNAMED";

/** Drop-in javac needed by newer checkers on a Java 8 runtime. */
export const ALTERNATE_FRONTEND: ArtifactCoordinates = {
	groupId: "com.google.errorprone",
	artifactId: "javac",
	version: "9+181-r4173-1",
};

/** Annotated JDK 8 overlay, versioned with the checker. */
export const annotatedStdlibCoordinates = (
	checkerVersion: string,
): ArtifactCoordinates => ({
	groupId: CHECKER_GROUP_ID,
	artifactId: "jdk8",
	version: checkerVersion,
});

const isJava8Build = (v: VersionPair): boolean =>
	v.runtimeVersion === 8 && v.sourceVersion === 8;

/** @pure true */
export function needsModuleVisibilityFlags(v: VersionPair): boolean {
	return v.runtimeVersion >= 9;
}

/**
 * @pure true
 * @invariant unparseable checker version → required
 */
export function needsAlternateFrontend(
	v: VersionPair,
	checker: Option.Option<CheckerVersion>,
): boolean {
	if (!isJava8Build(v)) return false;
	return Option.match(checker, {
		onNone: () => true,
		onSome: ({ major, minor }) => major >= 3 || (major === 2 && minor >= 11),
	});
}

/**
 * @pure true
 * @invariant unparseable checker version → not required
 */
export function needsAnnotatedStdlib(
	v: VersionPair,
	checker: Option.Option<CheckerVersion>,
): boolean {
	if (!isJava8Build(v)) return false;
	return Option.match(checker, {
		onNone: () => false,
		onSome: ({ major, minor }) => major < 3 || (major === 3 && minor <= 3),
	});
}

/**
 * Full compatibility decision for one run.
 *
 * @pure true
 * @complexity O(1)
 */
export function decideCompatibility(
	v: VersionPair,
	checker: Option.Option<CheckerVersion>,
): CompatibilityDecision {
	return {
		needsAlternateFrontend: needsAlternateFrontend(v, checker),
		needsAnnotatedStdlib: needsAnnotatedStdlib(v, checker),
		needsModuleVisibilityFlags: needsModuleVisibilityFlags(v),
	};
}

/**
 * Module-visibility tokens, with the `-J` prefix when they must reach the
 * JVM that hosts javac rather than javac itself.
 *
 * @pure true
 */
export function moduleVisibilityTokens(jvmPrefix: string): ReadonlyArray<string> {
	return [...MODULE_EXPORTS, MODULE_OPENS].map((flag) => `${jvmPrefix}${flag}`);
}
