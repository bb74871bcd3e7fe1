#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect, Either, Layer } from "effect";

import { program } from "../app/program.js";
import { RemoteRepositoryLive } from "../shell/artifacts/remote.js";
import { parseCLIArgs } from "../shell/config/index.js";
import { ArgFileWriterLive } from "../shell/invocation/argfiles.js";
import { consoleLoggerLayer } from "../shell/logging/logger.js";
import { ProcessRunnerLive } from "../shell/process/runner.js";
import { JavaRuntimeProbeLive } from "../shell/runtime/java-runtime.js";

const cli = parseCLIArgs();
const debug = Either.match(cli, { onLeft: () => false, onRight: (c) => c.debug });

const services = Layer.mergeAll(
	ProcessRunnerLive,
	ArgFileWriterLive,
	RemoteRepositoryLive,
	JavaRuntimeProbeLive,
	consoleLoggerLayer(debug),
);

void Effect.runPromise(program(cli).pipe(Effect.provide(services))).then(
	(code) => process.exit(code),
	(error: unknown) => {
		console.error("Fatal error:", error);
		process.exit(1);
	},
);
