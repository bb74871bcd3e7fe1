// CHANGE: Functional Core models of a checker run outcome
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the runner process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

export type SkipReason =
	| "skip-flag"
	| "aggregator-packaging"
	| "no-processors"
	| "no-sources";

/**
 * Result of a run that did not end with an error.
 *
 * `Completed.exitCode` mirrors the compiler's exit code; it is non-zero only
 * when the run is configured not to fail on checker errors.
 */
export type RunOutcome =
	| { readonly _tag: "Skipped"; readonly reason: SkipReason }
	| {
			readonly _tag: "Completed";
			readonly exitCode: number;
			readonly errorLines: number;
	  };
