// CHANGE: Pure normalization of Java version strings to a major version
// PURITY: CORE
// FORMAT THEOREM:
//   ∀N ∈ [5,8]: javaMajor("N") = javaMajor("1.N") = N
//   ∀s = "M[.-+]…" with M ≥ 9: javaMajor(s) = M
//   unparseable(s) → javaMajor(s) = UNKNOWN_VERSION
// INVARIANT: No I/O; total over all strings
// COMPLEXITY: O(|s|)

import type { BuildContext } from "../types/index.js";

/** Sentinel for "version requirement cannot be verified". */
export const UNKNOWN_VERSION = -1;

/** The oldest Java release the checker can run against. */
export const MINIMUM_JAVA_VERSION = 8;

export const SOURCE_PROPERTY = "maven.compiler.source";
export const TARGET_PROPERTY = "maven.compiler.target";

const LEGACY_BARE = /^[5-8]$/;
const LEADING_INT = /^(\d+)(?:[.\-+_]|$)/;

/**
 * Map a bare legacy release ("8") to its dotted form ("1.8").
 *
 * @pure true
 */
export function toDottedLegacy(raw: string): string {
	return LEGACY_BARE.test(raw) ? `1.${raw}` : raw;
}

/**
 * Reduce a Java version string to its major version.
 *
 * @param raw e.g. "1.8", "8", "11", "17.0.1", "11-ea", "9+10"
 * @returns Major version, or UNKNOWN_VERSION when unparseable or absent
 *
 * @pure true
 * @complexity O(|raw|)
 *
 * @example
 * ```ts
 * javaMajor("1.8.0_292"); // 8
 * javaMajor("9+10");      // 9
 * javaMajor("");          // -1
 * ```
 */
export function javaMajor(raw: string | undefined): number {
	const trimmed = raw?.trim() ?? "";
	if (trimmed.length === 0) return UNKNOWN_VERSION;

	const normalized = toDottedLegacy(trimmed);
	const legacy = normalized.startsWith("1.")
		? normalized.slice(2)
		: normalized;
	const match = LEADING_INT.exec(legacy);
	if (match === null) return UNKNOWN_VERSION;

	const major = Number.parseInt(match[1] ?? "", 10);
	return Number.isSafeInteger(major) ? major : UNKNOWN_VERSION;
}

/**
 * Raw source-language version configured by the build, if any.
 *
 * @pure true
 * @invariant source property wins over target property
 */
export function configuredSourceVersion(
	ctx: Pick<BuildContext, "properties">,
): string | undefined {
	const source = ctx.properties[SOURCE_PROPERTY];
	if (source !== undefined && source.trim().length > 0) return source;
	const target = ctx.properties[TARGET_PROPERTY];
	return target !== undefined && target.trim().length > 0 ? target : undefined;
}

/**
 * Major source-language version of the build (`-1` when unknown).
 *
 * @pure true
 */
export function sourceVersion(ctx: Pick<BuildContext, "properties">): number {
	return javaMajor(configuredSourceVersion(ctx));
}
