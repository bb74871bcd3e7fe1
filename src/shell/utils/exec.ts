// CHANGE: Shared execAsync + Effect pattern for short-lived helper commands
// PURITY: SHELL (executes external commands)
// EFFECT: Effect<CommandOutput, ExecError, never>
// INVARIANT: ∀ command: execCommand(command) → output ∨ ExecError
// COMPLEXITY: O(1) time, O(n) space where n = output length

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";

const execFileAsync = promisify(execFile);

export interface CommandOutput {
	readonly stdout: string;
	readonly stderr: string;
}

/**
 * Extract captured output from a rejected exec call, if the process ran at all.
 *
 * @pure true
 * @complexity O(1)
 */
export function extractOutputFromError(error: unknown): CommandOutput | null {
	if (typeof error !== "object" || error === null) return null;
	const stdout = "stdout" in error ? error.stdout : undefined;
	const stderr = "stderr" in error ? error.stderr : undefined;
	const out = typeof stdout === "string" ? stdout : "";
	const err = typeof stderr === "string" ? stderr : "";
	return out.trim().length > 0 || err.trim().length > 0
		? { stdout: out, stderr: err }
		: null;
}

/**
 * Execute a command (no shell) and capture both output streams.
 *
 * A non-zero exit that still produced output succeeds with that output;
 * spawn failures and silent failures become ExecError.
 *
 * @pure false (executes external command)
 * @effect Effect<CommandOutput, ExecError, never>
 */
export function execCommand(
	file: string,
	args: ReadonlyArray<string>,
	options?: { readonly timeout?: number },
): Effect.Effect<CommandOutput, ExecError> {
	const command = [file, ...args].join(" ");
	return Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], {
				timeout: options?.timeout ?? 10_000,
				encoding: "utf8",
			}),
		catch: (error) => error,
	}).pipe(
		Effect.map(({ stdout, stderr }): CommandOutput => ({ stdout, stderr })),
		Effect.catchAll((error) => {
			const out = extractOutputFromError(error);
			if (out !== null) {
				return Effect.succeed(out);
			}
			return Effect.fail(
				new ExecError({
					command,
					detail: error instanceof Error ? error.message : String(error),
				}),
			);
		}),
	);
}
