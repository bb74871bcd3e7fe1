// CHANGE: Parse Checker Framework versions into (major, minor)
// PURITY: CORE
// INVARIANT: "X.Y[.*]" with numeric X, Y → Some({major: X, minor: Y}); otherwise None
// COMPLEXITY: O(|s|)

import { Option } from "effect";

import type { DeclaredArtifact } from "../types/index.js";

export interface CheckerVersion {
	readonly major: number;
	readonly minor: number;
}

export const CHECKER_GROUP_ID = "org.checkerframework";
export const DEFAULT_CHECKER_VERSION = "3.53.0";

const NUMERIC = /^\d+$/;

/**
 * Parse "3.53.0" into `{ major: 3, minor: 53 }`.
 *
 * @returns None for empty, single-component or non-numeric strings
 * @pure true
 */
export function parseCheckerVersion(
	raw: string | undefined,
): Option.Option<CheckerVersion> {
	if (raw === undefined || raw.length === 0) return Option.none();
	const [major, minor] = raw.split(".");
	if (
		major === undefined ||
		minor === undefined ||
		!NUMERIC.test(major) ||
		!NUMERIC.test(minor)
	) {
		return Option.none();
	}
	return Option.some({
		major: Number.parseInt(major, 10),
		minor: Number.parseInt(minor, 10),
	});
}

/**
 * Version of a declared `checker-qual` dependency, if the project pins one.
 *
 * @pure true
 */
export function checkerVersionFromDependencies(
	dependencies: ReadonlyArray<DeclaredArtifact>,
): Option.Option<string> {
	return Option.fromNullable(
		dependencies.find(
			(a) => a.groupId === CHECKER_GROUP_ID && a.artifactId === "checker-qual",
		)?.version,
	).pipe(Option.filter((v) => v.length > 0));
}

/**
 * Pick the checker version for a run.
 *
 * Priority: explicit option, then the project's checker-qual, then the default.
 *
 * @pure true
 */
export function effectiveCheckerVersion(
	explicit: string | undefined,
	dependencies: ReadonlyArray<DeclaredArtifact>,
): string {
	if (explicit !== undefined && explicit.length > 0) return explicit;
	return Option.getOrElse(
		checkerVersionFromDependencies(dependencies),
		() => DEFAULT_CHECKER_VERSION,
	);
}
