// CHANGE: User-facing options of a checker run
// PURITY: CORE
// INVARIANT: Options are immutable once parsed
// COMPLEXITY: O(1)

/**
 * Options controlling one checker run.
 *
 * @property processors Fully-qualified checker class names; empty means "skip"
 * @property checkerVersion Explicit Checker Framework version; inferred when absent
 * @property extraArgs Extra compiler arguments appended before the source list
 * @property skip Skip the run entirely
 * @property procOnly Only run annotation processing, generate no class files
 * @property failOnError Turn a non-zero compiler exit into a build failure
 * @property excludeTests Leave test source roots out of the source set
 * @property suppressLombokWarnings Suppress the false positives delombok output causes
 * @property executable Compiler executable name or path ("javac" or the "java" launcher)
 * @property includes Source include patterns, relative to each root
 * @property excludes Source exclude patterns, relative to each root
 * @property offline Disable remote artifact retrieval
 * @property debug Print debug log lines (including the assembled command)
 */
export interface CheckerOptions {
	readonly processors: ReadonlyArray<string>;
	readonly checkerVersion?: string;
	readonly extraArgs: ReadonlyArray<string>;
	readonly skip: boolean;
	readonly procOnly: boolean;
	readonly failOnError: boolean;
	readonly excludeTests: boolean;
	readonly suppressLombokWarnings: boolean;
	readonly executable: string;
	readonly includes: ReadonlyArray<string>;
	readonly excludes: ReadonlyArray<string>;
	readonly offline: boolean;
	readonly debug: boolean;
}

export const DEFAULT_OPTIONS: CheckerOptions = {
	processors: [],
	extraArgs: [],
	skip: false,
	procOnly: true,
	failOnError: true,
	excludeTests: false,
	suppressLombokWarnings: true,
	executable: "javac",
	includes: [],
	excludes: [],
	offline: false,
	debug: false,
};

/**
 * Option values set by one configuration layer (file or command line).
 */
export type OptionOverrides = {
	-readonly [K in keyof CheckerOptions]?: CheckerOptions[K];
};

/**
 * Apply override layers left to right on top of `base`.
 *
 * @pure true
 * @invariant Keys absent from every layer keep their `base` value
 */
export function applyOverrides(
	base: CheckerOptions,
	...layers: ReadonlyArray<OptionOverrides>
): CheckerOptions {
	return layers.reduce<CheckerOptions>((acc, layer) => ({ ...acc, ...layer }), base);
}
