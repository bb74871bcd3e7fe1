// CHANGE: Choose the source roots to analyze, substituting delombok output
// PURITY: CORE
// INVARIANT: main roots come before test roots; disabled roots never appear
// COMPLEXITY: O(r) where r = |roots|

import { Option } from "effect";

import type { LombokState } from "../lombok/lombok.js";
import type { BuildContext, CheckerOptions, SourceRoot } from "../types/index.js";

export const DEFAULT_INCLUDE = "**/*.java";

const enabledPaths = (roots: ReadonlyArray<SourceRoot>): ReadonlyArray<string> =>
	roots.filter((r) => r.enabled).map((r) => r.path);

/**
 * Source roots for a run.
 *
 * A present delombok directory replaces the main roots; a present test
 * delombok directory replaces the test roots.
 *
 * @pure true
 */
export function effectiveSourceRoots(
	ctx: Pick<BuildContext, "mainSourceRoots" | "testSourceRoots">,
	options: Pick<CheckerOptions, "excludeTests">,
	lombok: LombokState,
): ReadonlyArray<string> {
	const main = Option.match(lombok.deLombokOutputDir, {
		onNone: () => enabledPaths(ctx.mainSourceRoots),
		onSome: (dir) => [dir],
	});
	if (options.excludeTests) return main;
	const test = Option.match(lombok.testDeLombokOutputDir, {
		onNone: () => enabledPaths(ctx.testSourceRoots),
		onSome: (dir) => [dir],
	});
	return [...main, ...test];
}

/** Include patterns, defaulting to every Java file. */
export const includePatterns = (
	options: Pick<CheckerOptions, "includes">,
): ReadonlyArray<string> =>
	options.includes.length > 0 ? options.includes : [DEFAULT_INCLUDE];
