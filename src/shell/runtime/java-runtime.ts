// CHANGE: Probe the Java runtime executing the build when the host does not report it
// PURITY: SHELL
// EFFECT: Effect<Option<string>, never, JavaRuntimeProbe>
// INVARIANT: Probe failures yield None, never an error
// COMPLEXITY: O(1) process spawns

import * as path from "node:path";

import { Context, Effect, Layer, Option } from "effect";

import { execCommand } from "../utils/exec.js";

/**
 * Reports `java.version` of the runtime that executes the build.
 */
export class JavaRuntimeProbe extends Context.Tag("JavaRuntimeProbe")<
	JavaRuntimeProbe,
	{
		readonly javaVersion: Effect.Effect<Option.Option<string>>;
	}
>() {}

const VERSION_LINE = /version "([^"]+)"/;

/**
 * Extract the quoted version from `java -version` output.
 *
 * @pure true
 * @example
 * ```ts
 * parseJavaVersionOutput('openjdk version "17.0.2" 2022-01-18'); // Some("17.0.2")
 * ```
 */
export function parseJavaVersionOutput(output: string): Option.Option<string> {
	const match = VERSION_LINE.exec(output);
	return Option.fromNullable(match?.[1]);
}

/** `java` of JAVA_HOME when set, otherwise the one on PATH. */
export function javaLauncher(env: NodeJS.ProcessEnv): string {
	const home = env["JAVA_HOME"];
	return home !== undefined && home.length > 0
		? path.join(home, "bin", "java")
		: "java";
}

export const JavaRuntimeProbeLive = Layer.succeed(JavaRuntimeProbe, {
	javaVersion: execCommand(javaLauncher(process.env), ["-version"]).pipe(
		Effect.map(({ stdout, stderr }) =>
			parseJavaVersionOutput(`${stderr}\n${stdout}`),
		),
		Effect.tapError((error) =>
			Effect.logDebug(`Could not probe Java runtime: ${error.detail}`),
		),
		Effect.orElseSucceed(() => Option.none<string>()),
	),
});

/** Probe for hosts and tests that already know the version. */
export const fixedJavaRuntime = (version: string): Layer.Layer<JavaRuntimeProbe> =>
	Layer.succeed(JavaRuntimeProbe, {
		javaVersion: Effect.succeed(Option.some(version)),
	});
