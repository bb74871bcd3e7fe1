// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: APP orchestration, CORE decisions and the service tags with their live layers
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run the checker against a build described in memory.
 *
 * @example
 * ```typescript
 * import { Effect, Either, Layer } from "effect";
 * import {
 *   ArgFileWriterLive,
 *   DEFAULT_OPTIONS,
 *   JavaRuntimeProbeLive,
 *   ProcessRunnerLive,
 *   RemoteRepositoryLive,
 *   runChecker,
 * } from "checker-runner";
 *
 * const outcome = await Effect.runPromise(
 *   runChecker(build, { ...DEFAULT_OPTIONS, processors: ["nullness"] }).pipe(
 *     Effect.either,
 *     Effect.provide(Layer.mergeAll(ProcessRunnerLive, ArgFileWriterLive, RemoteRepositoryLive, JavaRuntimeProbeLive)),
 *   ),
 * );
 * ```
 */
export { type CheckerServices, execute, runChecker } from "./app/runChecker.js";
export { program, runFromCli } from "./app/program.js";
export { JAVAC_MAIN, plan } from "./app/planner.js";
export { prepareRun, type RunContext } from "./app/run-context.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	ArtifactCoordinates,
	BuildContext,
	BuildPlugin,
	CheckerOptions,
	DeclaredArtifact,
	OptionOverrides,
	PluginConfiguration,
	PluginExecution,
	SourceRoot,
	Toolchain,
} from "./core/types/index.js";
export { applyOverrides, DEFAULT_OPTIONS } from "./core/types/index.js";
export type { ExitCode, RunOutcome, SkipReason } from "./core/models.js";
export {
	CheckerFailure,
	ConfigError,
	ExecError,
	ExecutionError,
	FSError,
	ResolutionError,
	type RunError,
	VersionRequirementError,
} from "./core/errors.js";
export { describeResult, exitCodeOf } from "./core/decision.js";
export {
	type CompatibilityDecision,
	decideCompatibility,
	type VersionPair,
} from "./core/compat/rules.js";
export { javaMajor, sourceVersion } from "./core/version/java-version.js";
export {
	DEFAULT_CHECKER_VERSION,
	effectiveCheckerVersion,
	parseCheckerVersion,
} from "./core/version/checker-version.js";
export { type InvocationPlan, SECTION_ORDER } from "./core/invocation/sections.js";
export { renderCommand, shellQuote } from "./core/invocation/render.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { RemoteRepository, RemoteRepositoryLive } from "./shell/artifacts/remote.js";
export { ArgFileWriter, ArgFileWriterLive } from "./shell/invocation/argfiles.js";
export { ProcessRunner, ProcessRunnerLive } from "./shell/process/runner.js";
export {
	fixedJavaRuntime,
	JavaRuntimeProbe,
	JavaRuntimeProbeLive,
} from "./shell/runtime/java-runtime.js";
export { consoleLoggerLayer } from "./shell/logging/logger.js";
export { loadConfig, parseCLIArgs, parseConfig } from "./shell/config/index.js";
