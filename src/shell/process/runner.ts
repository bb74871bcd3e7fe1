// CHANGE: Spawn the compiler and stream its merged output line by line
// PURITY: SHELL (child process)
// EFFECT: Effect<number, ExecError, never>
// INVARIANT: All output lines are delivered before the exit code is returned
// COMPLEXITY: O(n) where n = output lines

import { spawn } from "node:child_process";
import * as readline from "node:readline";

import { Context, Effect, Fiber, Layer, Option, Queue } from "effect";

import { ExecError } from "../../core/errors.js";

export type LineSink = (line: string) => Effect.Effect<void>;

/**
 * Runs one child process; stdin is unused, stdout and stderr are merged.
 */
export class ProcessRunner extends Context.Tag("ProcessRunner")<
	ProcessRunner,
	{
		readonly run: (
			command: ReadonlyArray<string>,
			onLine: LineSink,
		) => Effect.Effect<number, ExecError>;
	}
>() {}

function spawnAndDrain(
	command: ReadonlyArray<string>,
	emit: (line: string) => void,
): Effect.Effect<number, ExecError> {
	const [file, ...args] = command;
	const rendered = command.join(" ");
	if (file === undefined) {
		return Effect.fail(new ExecError({ command: rendered, detail: "empty command" }));
	}
	return Effect.async<number, ExecError>((resume) => {
		let settled = false;
		const settle = (result: Effect.Effect<number, ExecError>): void => {
			if (settled) return;
			settled = true;
			resume(result);
		};

		const child = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });
		readline.createInterface({ input: child.stdout }).on("line", emit);
		readline.createInterface({ input: child.stderr }).on("line", emit);

		child.on("error", (error) =>
			settle(Effect.fail(new ExecError({ command: rendered, detail: error.message }))),
		);
		// "close" fires once the process exited and both pipes are drained
		child.on("close", (code, signal) =>
			settle(
				code === null
					? Effect.fail(
							new ExecError({
								command: rendered,
								detail: `terminated by signal ${signal ?? "unknown"}`,
							}),
						)
					: Effect.succeed(code),
			),
		);

		return Effect.sync(() => {
			if (child.exitCode === null) child.kill();
		});
	});
}

/**
 * Output lines are queued by the stream callbacks and handed to `onLine` in
 * arrival order by a fiber of the run, so the sink may suspend.
 */
export const ProcessRunnerLive = Layer.succeed(ProcessRunner, {
	run: (command, onLine) =>
		Effect.gen(function* () {
			// None marks the end of output
			const lines = yield* Queue.unbounded<Option.Option<string>>();
			const drain: Effect.Effect<void> = Effect.flatMap(Queue.take(lines), (next) =>
				Option.match(next, {
					onNone: () => Effect.void,
					onSome: (line) => Effect.zipRight(onLine(line), drain),
				}),
			);
			const drainer = yield* Effect.fork(drain);

			const exit = yield* Effect.exit(
				spawnAndDrain(command, (line) => {
					Queue.unsafeOffer(lines, Option.some(line));
				}),
			);
			yield* Queue.offer(lines, Option.none());
			yield* Fiber.join(drainer);
			return yield* exit;
		}),
});
