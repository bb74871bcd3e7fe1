// CHANGE: Command-line program: configuration, one run and its summary
// PURITY: APP (logs through Effect; never exits the process)
// EFFECT: Effect<ExitCode, never, CheckerServices>
// INVARIANT: Every error of the run is reported once and mapped to exit code 1
// COMPLEXITY: O(1) orchestration

import * as path from "node:path";

import { Effect, Either } from "effect";

import { describeResult, exitCodeOf } from "../core/decision.js";
import type { ConfigError, RunError } from "../core/errors.js";
import type { ExitCode, RunOutcome } from "../core/models.js";
import { applyOverrides, DEFAULT_OPTIONS } from "../core/types/index.js";
import { type CLIOptions, DEFAULT_CONFIG_FILE, loadConfig } from "../shell/config/index.js";
import { type CheckerServices, runChecker } from "./runChecker.js";

/**
 * Load the build description named on the command line and run the checker.
 *
 * Options from the file are applied first; command-line flags win.
 *
 * @effect Effect<RunOutcome, RunError, CheckerServices>
 */
export function runFromCli(
	cli: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<RunOutcome, RunError, CheckerServices> {
	return Effect.gen(function* () {
		const file = path.resolve(cwd, cli.configFile ?? DEFAULT_CONFIG_FILE);
		const config = yield* loadConfig(file, cli.configFile !== undefined);
		const options = applyOverrides(DEFAULT_OPTIONS, config.options, cli.overrides, {
			debug: cli.debug,
		});
		return yield* runChecker(config.build, options);
	});
}

/**
 * Run and summarize.
 *
 * @returns ExitCode (0 = success or skipped, 1 = any error)
 * @effect Effect<ExitCode, never, CheckerServices>
 */
export function program(
	cli: Either.Either<CLIOptions, ConfigError>,
	cwd?: string,
): Effect.Effect<ExitCode, never, CheckerServices> {
	return Effect.gen(function* () {
		const run: Effect.Effect<RunOutcome, RunError, CheckerServices> = Either.match(cli, {
			onLeft: (error) => Effect.fail(error),
			onRight: (options) => runFromCli(options, cwd),
		});
		const result = yield* Effect.either(run);

		const summary = describeResult(result);
		yield* Either.isLeft(result) ? Effect.logError(summary) : Effect.logInfo(summary);
		return exitCodeOf(result);
	});
}
