// CHANGE: Pure decision mapping a finished run to the process exit code
// FORMAT THEOREM: ∀r: exitCodeOf(r) = 1 ↔ r is a failure
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping Either<RunOutcome, RunError> → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Either } from "effect";
import { match } from "ts-pattern";

import type { RunError } from "./errors.js";
import type { ExitCode, RunOutcome } from "./models.js";

/**
 * Computes the process exit code of a finished run.
 *
 * Skipped runs and completed runs (including tolerated checker errors) exit
 * with 0; every error exits with 1.
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 */
export const exitCodeOf = (
	result: Either.Either<RunOutcome, RunError>,
): ExitCode =>
	Either.match(result, {
		onLeft: (): ExitCode => 1,
		onRight: (outcome): ExitCode =>
			match(outcome)
				.with({ _tag: "Skipped" }, (): ExitCode => 0)
				.with({ _tag: "Completed" }, (): ExitCode => 0)
				.exhaustive(),
	});

/**
 * One-line human summary of a finished run.
 *
 * @pure true
 */
export const describeResult = (
	result: Either.Either<RunOutcome, RunError>,
): string =>
	Either.match(result, {
		onLeft: (error) =>
			match(error)
				.with({ _tag: "ConfigError" }, (e) => `Configuration error: ${e.detail}`)
				.with(
					{ _tag: "VersionRequirementError" },
					(e) =>
						`Java ${e.subject} version ${e.raw.length > 0 ? `"${e.raw}"` : "(unset)"} resolved to ${e.version}; 8 or newer is required`,
				)
				.with(
					{ _tag: "CheckerFailure" },
					(e) => `Checker Framework found errors (exit code ${e.exitCode}).`,
				)
				.with(
					{ _tag: "ExecutionError" },
					(e) => `Error running Checker Framework: ${e.detail}`,
				)
				.exhaustive(),
		onRight: (outcome) =>
			match(outcome)
				.with({ _tag: "Skipped" }, (o) => `Skipped (${o.reason}).`)
				.with({ _tag: "Completed", exitCode: 0 }, () =>
					"Checker Framework analysis completed successfully.",
				)
				.with(
					{ _tag: "Completed" },
					(o) =>
						`Checker Framework reported errors (exit code ${o.exitCode}); not failing the build.`,
				)
				.exhaustive(),
	});
