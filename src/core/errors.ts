// CHANGE: Typed domain error ADT for the checker run using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Build description or option could not be read or validated.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * A Java version requirement could not be confirmed (below 8 or unparseable).
 *
 * @pure true (Data class)
 * @invariant version < 8 (the sentinel -1 included)
 */
export class VersionRequirementError extends Data.TaggedError(
	"VersionRequirementError",
)<{
	readonly subject: "source" | "runtime";
	readonly raw: string;
	readonly version: number;
}> {}

/**
 * A single resolution tier failed. Never escapes the resolver: the next tier is tried.
 *
 * @pure true (Data class)
 */
export class ResolutionError extends Data.TaggedError("ResolutionError")<{
	readonly tier: string;
	readonly coordinates: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Command execution error (spawn failure, broken pipe)
 *
 * @pure true (Data class)
 * @invariant command.length > 0 ∧ detail.length > 0
 */
export class ExecError extends Data.TaggedError("Exec")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * The checker reported errors and the run is configured to fail on them.
 *
 * @pure true (Data class)
 * @invariant exitCode ≠ 0
 */
export class CheckerFailure extends Data.TaggedError("CheckerFailure")<{
	readonly exitCode: number;
}> {}

/**
 * Unexpected I/O or spawn failure wrapped at the run boundary.
 *
 * @pure true (Data class)
 */
export class ExecutionError extends Data.TaggedError("ExecutionError")<{
	readonly detail: string;
	readonly reason: FSError | ExecError;
}> {}

/**
 * Union of the errors a checker run may end with.
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type RunError =
	| ConfigError
	| VersionRequirementError
	| CheckerFailure
	| ExecutionError;
