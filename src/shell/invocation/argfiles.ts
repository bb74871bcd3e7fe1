// CHANGE: Scoped temporary argument files referenced as "@file" compiler arguments
// PURITY: SHELL (filesystem)
// EFFECT: Effect<string, FSError, Scope>
// INVARIANT: Every file created inside a scope is removed when the scope closes, whatever the exit
// COMPLEXITY: O(n) where n = total characters written

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { Context, Effect, Layer, type Scope } from "effect";

import { FSError } from "../../core/errors.js";
import { fileReference } from "../../core/invocation/render.js";

/**
 * Turns a list of argument-file lines into a single compiler argument.
 */
export class ArgFileWriter extends Context.Tag("ArgFileWriter")<
	ArgFileWriter,
	{
		/**
		 * @returns `@<absolute path>`, valid until the enclosing scope closes
		 */
		readonly write: (
			prefix: string,
			lines: ReadonlyArray<string>,
		) => Effect.Effect<string, FSError, Scope.Scope>;
	}
>() {}

const createArgFile = (
	directory: string,
	prefix: string,
	lines: ReadonlyArray<string>,
): Effect.Effect<string, FSError> =>
	Effect.tryPromise({
		try: async () => {
			const dir = await fs.mkdtemp(path.join(directory, `${prefix}-`));
			const file = path.join(dir, "args");
			const content = lines.length > 0 ? `${lines.join("\n")}\n` : "";
			await fs.writeFile(file, content, { encoding: "utf-8" });
			return file;
		},
		catch: (error) =>
			new FSError({
				detail: `Failed to write argument file: ${String(error)}`,
				path: directory,
			}),
	});

const removeArgFile = (file: string): Effect.Effect<void> =>
	Effect.promise(() =>
		fs.rm(path.dirname(file), { recursive: true, force: true }),
	).pipe(
		Effect.catchAllDefect((defect) =>
			Effect.logWarning(`Could not delete argument file ${file}: ${String(defect)}`),
		),
	);

/**
 * Argument-file writer rooted at `directory` (the OS temp dir by default).
 */
export const tempArgFileWriter = (directory: string = os.tmpdir()) =>
	Layer.succeed(ArgFileWriter, {
		write: (prefix, lines) =>
			Effect.acquireRelease(createArgFile(directory, prefix, lines), removeArgFile).pipe(
				Effect.map(fileReference),
			),
	});

export const ArgFileWriterLive = tempArgFileWriter();
