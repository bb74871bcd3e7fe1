// CHANGE: Route Effect's logging to Maven-style console lines
// PURITY: SHELL (console output)
// EFFECT: Layer<never> replacing the default logger
// INVARIANT: Every log call produces exactly one "[LEVEL] message" line
// COMPLEXITY: O(|message|)

import { Layer, LogLevel, Logger } from "effect";
import { match } from "ts-pattern";

/**
 * Flatten a log message (Effect passes the variadic arguments as an array).
 *
 * @pure true
 */
export function messageText(message: unknown): string {
	const parts: ReadonlyArray<unknown> = Array.isArray(message)
		? message
		: [message];
	return parts
		.map((part) => (typeof part === "string" ? part : String(part)))
		.join(" ");
}

/** Maven-style level tag: "[INFO]", "[WARNING]", "[ERROR]", "[DEBUG]". */
export const levelTag = (level: LogLevel.LogLevel): string =>
	match(level._tag)
		.with("Fatal", "Error", () => "[ERROR]")
		.with("Warning", () => "[WARNING]")
		.with("Debug", "Trace", "All", () => "[DEBUG]")
		.otherwise(() => "[INFO]");

/** One formatted line per message line, so multi-line commands stay tagged. */
export const formatLine = (level: LogLevel.LogLevel, message: unknown): string => {
	const tag = levelTag(level);
	return messageText(message)
		.split("\n")
		.map((line) => `${tag} ${line}`)
		.join("\n");
};

export const consoleLogger = Logger.make<unknown, void>(({ logLevel, message }) => {
	const line = formatLine(logLevel, message);
	if (LogLevel.greaterThanEqual(logLevel, LogLevel.Warning)) {
		console.error(line);
	} else {
		console.log(line);
	}
});

/**
 * Logger layer for the CLI.
 *
 * @param debug Lower the minimum level to Debug
 */
export const consoleLoggerLayer = (debug: boolean): Layer.Layer<never> =>
	Layer.merge(
		Logger.replace(Logger.defaultLogger, consoleLogger),
		Logger.minimumLogLevel(debug ? LogLevel.Debug : LogLevel.Info),
	);
