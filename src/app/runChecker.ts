// CHANGE: Application layer orchestration of one checker run
// PURITY: APP (no process.exit; console output goes through Effect's logger)
// EFFECT: Effect<RunOutcome, RunError, CheckerServices>
// INVARIANT: Argument files are released on every exit path; exit code of the compiler is reported as-is
// COMPLEXITY: O(f + l) where f = source files, l = compiler output lines

import { Effect, Logger, LogLevel, Ref } from "effect";

import {
	CheckerFailure,
	ExecutionError,
	type ExecError,
	type FSError,
	type RunError,
} from "../core/errors.js";
import { renderCommand } from "../core/invocation/render.js";
import type { InvocationPlan } from "../core/invocation/sections.js";
import type { RunOutcome } from "../core/models.js";
import type { BuildContext, CheckerOptions } from "../core/types/index.js";
import type { RemoteRepository } from "../shell/artifacts/remote.js";
import type { ArgFileWriter } from "../shell/invocation/argfiles.js";
import { ProcessRunner } from "../shell/process/runner.js";
import type { JavaRuntimeProbe } from "../shell/runtime/java-runtime.js";
import { plan } from "./planner.js";
import { prepareRun } from "./run-context.js";

export type CheckerServices =
	| ProcessRunner
	| ArgFileWriter
	| RemoteRepository
	| JavaRuntimeProbe;

/** Substring marking a compiler diagnostic as an error. */
export const ERROR_MARKER = "error:";

export interface ExecutionResult {
	readonly exitCode: number;
	readonly errorLines: number;
}

/**
 * Run a planned invocation, streaming every output line to the log.
 *
 * @effect Effect<ExecutionResult, ExecError, ProcessRunner>
 * @postcondition result.exitCode is the child's exit code
 */
export function execute(
	invocation: InvocationPlan,
): Effect.Effect<ExecutionResult, ExecError, ProcessRunner> {
	return Effect.gen(function* () {
		const runner = yield* ProcessRunner;
		const errorLines = yield* Ref.make(0);
		yield* Effect.logDebug(`Executing command:\n${renderCommand(invocation.tokens)}`);

		const exitCode = yield* runner.run(invocation.tokens, (line) =>
			line.includes(ERROR_MARKER)
				? Effect.zipRight(Ref.update(errorLines, (n) => n + 1), Effect.logError(line))
				: Effect.logInfo(line),
		);
		return { exitCode, errorLines: yield* Ref.get(errorLines) };
	});
}

const wrapUnexpected = (error: FSError | ExecError): ExecutionError =>
	new ExecutionError({ detail: error.detail, reason: error });

/**
 * Orchestrates one checker run and returns its outcome as a value.
 *
 * @param build Read-only view of the Java build
 * @param options User-facing options
 * @returns Skipped, or Completed with the compiler's exit code
 *
 * @effect Effect<RunOutcome, RunError, CheckerServices>
 * @postcondition exit ≠ 0 ∧ failOnError → CheckerFailure
 * @postcondition options.debug → debug lines of the run are logged
 */
export function runChecker(
	build: BuildContext,
	options: CheckerOptions,
): Effect.Effect<RunOutcome, RunError, CheckerServices> {
	const run = runWith(build, options);
	return options.debug ? Logger.withMinimumLogLevel(run, LogLevel.Debug) : run;
}

function runWith(
	build: BuildContext,
	options: CheckerOptions,
): Effect.Effect<RunOutcome, RunError, CheckerServices> {
	return Effect.gen(function* () {
		const prepared = yield* prepareRun(build, options).pipe(
			Effect.catchTag("FS", (e) => Effect.fail(wrapUnexpected(e))),
		);
		if ("_tag" in prepared) {
			return { _tag: "Skipped", reason: prepared.reason } as const;
		}

		const result = yield* Effect.scoped(
			Effect.flatMap(plan(prepared), execute),
		).pipe(Effect.mapError(wrapUnexpected));

		if (result.exitCode === 0) {
			yield* Effect.logInfo("Checker Framework analysis completed successfully.");
		} else if (options.failOnError) {
			yield* Effect.logError("Checker Framework found errors.");
			return yield* Effect.fail(new CheckerFailure({ exitCode: result.exitCode }));
		} else {
			yield* Effect.logWarning(
				`Checker Framework found errors (exit code ${result.exitCode}); failOnError is disabled.`,
			);
		}
		return {
			_tag: "Completed",
			exitCode: result.exitCode,
			errorLines: result.errorLines,
		} as const;
	});
}
