// CHANGE: Pure Lombok/delombok rules: usage detection, output path resolution, suppression merge
// PURITY: CORE
// INVARIANT: No filesystem access; existence checks live in SHELL
// COMPLEXITY: O(d + p) where d = |dependencies|, p = |plugins|

import * as path from "node:path";

import { Option } from "effect";

import type {
	BuildContext,
	BuildPlugin,
	PluginConfiguration,
} from "../types/index.js";

export const LOMBOK_GROUP_ID = "org.projectlombok";
export const LOMBOK_ARTIFACT_ID = "lombok";
export const LOMBOK_PLUGIN_ARTIFACT_ID = "lombok-maven-plugin";

export const BUILD_DIRECTORY_PLACEHOLDER = "${project.build.directory}";
export const BASEDIR_PLACEHOLDER = "${project.basedir}";
export const TEST_DELOMBOK_CONVENTION = `${BUILD_DIRECTORY_PLACEHOLDER}/generated-test-sources/delombok`;

export const SUPPRESS_WARNINGS_FLAG = "-AsuppressWarnings";
export const LOMBOK_SUPPRESSION_KEY = "type.anno.before.modifier";

const OUTPUT_DIRECTORY_KEY = "outputDirectory";

/**
 * Lombok facts sampled once per run.
 *
 * @invariant directories are present only if they existed when sampled
 */
export interface LombokState {
	readonly isUsed: boolean;
	readonly deLombokOutputDir: Option.Option<string>;
	readonly testDeLombokOutputDir: Option.Option<string>;
}

export const LOMBOK_UNUSED: LombokState = {
	isUsed: false,
	deLombokOutputDir: Option.none(),
	testDeLombokOutputDir: Option.none(),
};

const isLombokPlugin = (p: BuildPlugin): boolean =>
	p.groupId === LOMBOK_GROUP_ID && p.artifactId === LOMBOK_PLUGIN_ARTIFACT_ID;

/** @pure true */
export function findLombokPlugin(
	plugins: ReadonlyArray<BuildPlugin>,
): Option.Option<BuildPlugin> {
	return Option.fromNullable(plugins.find(isLombokPlugin));
}

/**
 * Lombok is used when the library is a dependency or its build plugin is configured.
 *
 * @pure true
 */
export function isLombokUsed(
	ctx: Pick<BuildContext, "dependencies" | "plugins">,
): boolean {
	const hasDependency = ctx.dependencies.some(
		(a) => a.groupId === LOMBOK_GROUP_ID && a.artifactId === LOMBOK_ARTIFACT_ID,
	);
	return hasDependency || Option.isSome(findLombokPlugin(ctx.plugins));
}

const configuredOutput = (
	config: PluginConfiguration,
): Option.Option<string> =>
	Option.fromNullable(config[OUTPUT_DIRECTORY_KEY]).pipe(
		Option.filter((value) => value.trim().length > 0),
	);

/**
 * Output-path expression of the first execution running `goal`.
 *
 * @pure true
 */
export function executionOutputExpression(
	plugin: BuildPlugin,
	goal: string,
): Option.Option<string> {
	for (const execution of plugin.executions) {
		if (!execution.goals.includes(goal)) continue;
		const found = configuredOutput(execution.configuration);
		if (Option.isSome(found)) return found;
	}
	return Option.none();
}

/**
 * Output-path expression for delombok: the `delombok` execution, else the
 * plugin-level configuration.
 *
 * @pure true
 */
export function delombokOutputExpression(
	plugin: BuildPlugin,
): Option.Option<string> {
	return Option.orElse(executionOutputExpression(plugin, "delombok"), () =>
		configuredOutput(plugin.configuration),
	);
}

/**
 * Output-path expression for test delombok: the `testDelombok` execution,
 * else the plugin's conventional test output directory.
 *
 * @pure true
 */
export function testDelombokOutputExpression(plugin: BuildPlugin): string {
	return Option.getOrElse(
		executionOutputExpression(plugin, "testDelombok"),
		() => TEST_DELOMBOK_CONVENTION,
	);
}

/**
 * Substitute build placeholders and anchor relative paths at the project root.
 *
 * @pure true
 * @example
 * ```ts
 * resolveBuildPath("${project.build.directory}/delombok", { baseDir: "/p", buildDirectory: "/p/target" });
 * // "/p/target/delombok"
 * ```
 */
export function resolveBuildPath(
	expression: string,
	ctx: Pick<BuildContext, "baseDir" | "buildDirectory">,
): string {
	const substituted = expression
		.replaceAll(BUILD_DIRECTORY_PLACEHOLDER, ctx.buildDirectory)
		.replaceAll(BASEDIR_PLACEHOLDER, ctx.baseDir);
	return path.isAbsolute(substituted)
		? path.normalize(substituted)
		: path.resolve(ctx.baseDir, substituted);
}

/**
 * Checkers whose Lombok builder checks depend on generated annotations.
 *
 * @pure true
 */
export function hasBuilderSensitiveChecker(
	processors: ReadonlyArray<string>,
): boolean {
	return processors.some(
		(p) =>
			p.includes("ObjectConstructionChecker") ||
			p.includes("CalledMethodsChecker"),
	);
}

/**
 * Merge a diagnostic key into the suppression argument of an argument list.
 *
 * - no suppression argument → one is appended
 * - suppression argument without the key → key appended comma-joined, in place
 * - suppression argument with the key → list returned unchanged
 *
 * @pure true
 * @invariant result contains exactly one argument carrying `key`
 * @complexity O(n) where n = |args|
 */
export function mergeSuppression(
	args: ReadonlyArray<string>,
	key: string = LOMBOK_SUPPRESSION_KEY,
): ReadonlyArray<string> {
	const index = args.findIndex((a) => a.startsWith(SUPPRESS_WARNINGS_FLAG));
	if (index < 0) return [...args, `${SUPPRESS_WARNINGS_FLAG}=${key}`];

	const existing = args[index] ?? "";
	const eq = existing.indexOf("=");
	const keys = eq < 0 ? [] : existing.slice(eq + 1).split(",");
	if (keys.includes(key)) return args;

	const merged =
		eq < 0 || existing.length === eq + 1
			? `${SUPPRESS_WARNINGS_FLAG}=${key}`
			: `${existing},${key}`;
	return args.map((a, i) => (i === index ? merged : a));
}
