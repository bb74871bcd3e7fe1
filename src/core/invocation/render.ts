// CHANGE: Render command lines for logs and argument files
// PURITY: CORE
// INVARIANT: Rendering never changes the token sequence, only its quoting
// COMPLEXITY: O(n) where n = total characters

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a token for POSIX shells (single quotes, embedded quotes escaped).
 *
 * @pure true
 */
export function shellQuote(token: string): string {
	if (token.length === 0) return "''";
	if (SHELL_SAFE.test(token)) return token;
	return `'${token.replaceAll("'", `'\\''`)}'`;
}

/**
 * Multi-line, shell-pasteable rendering of a command:
 *
 * ```
 * javac \
 *   -J--add-exports=… \
 *   @/tmp/sources
 * ```
 *
 * @pure true
 */
export function renderCommand(tokens: ReadonlyArray<string>): string {
	return tokens.map(shellQuote).join(" \\\n  ");
}

/**
 * Quote one entry of a javac `@argfile`: wrapped in double quotes when it
 * contains whitespace, with embedded double quotes and backslashes escaped.
 *
 * @pure true
 */
export function argFileEntry(value: string): string {
	if (!/[\s"']/.test(value)) return value;
	return `"${value.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`;
}

/**
 * Classpath argument file content: a single `-cp <classpath>` entry.
 *
 * @pure true
 */
export function classpathArgFile(
	elements: ReadonlyArray<string>,
	separator: string,
): ReadonlyArray<string> {
	return [`-cp ${argFileEntry(elements.join(separator))}`];
}

/**
 * Source list argument file content: one quoted path per line.
 *
 * @pure true
 */
export function sourceListArgFile(
	files: ReadonlyArray<string>,
): ReadonlyArray<string> {
	return files.map(argFileEntry);
}

/** `@file` reference token for an argument file. */
export const fileReference = (absolutePath: string): string => `@${absolutePath}`;
