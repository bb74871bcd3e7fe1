// CHANGE: Load the JSON build description into a BuildContext and option overrides
// PURITY: SHELL (file read) around a CORE-like validator
// EFFECT: Effect<LoadedConfig, ConfigError, never>
// INVARIANT: Every path in the resulting BuildContext is absolute
// COMPLEXITY: O(n) where n = size of the description

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";

import { Effect, Either, Option } from "effect";

import { ConfigError } from "../../core/errors.js";
import type {
	BuildContext,
	BuildPlugin,
	CheckerOptions,
	DeclaredArtifact,
	OptionOverrides,
	PluginExecution,
	SourceRoot,
	Toolchain,
} from "../../core/types/index.js";
import { DEFAULT_REMOTE_REPOSITORY } from "../artifacts/remote.js";
import {
	isJSONObject,
	type JSONObject,
	type JSONValue,
	objectAt,
	optionalArray,
	optionalBoolean,
	optionalObject,
	optionalString,
	optionalStringArray,
	type Read,
	requiredString,
	stringRecord,
} from "./json.js";

/** Looked up in the working directory when no `--config` is given. */
export const DEFAULT_CONFIG_FILE = "checker-build.json";

const DEFAULT_MAIN_ROOTS = ["src/main/java"];
const DEFAULT_TEST_ROOTS = ["src/test/java"];

export interface LoadedConfig {
	readonly build: BuildContext;
	readonly options: OptionOverrides;
}

/**
 * Host facts the validator needs but must not look up itself.
 */
export interface ConfigEnvironment {
	readonly homeDir: string;
}

const setIfDefined = <K extends keyof CheckerOptions>(
	target: OptionOverrides,
	key: K,
	value: CheckerOptions[K] | undefined,
): void => {
	if (value !== undefined) target[key] = value;
};

function parseSourceRoots(
	obj: JSONObject,
	key: "main" | "test",
	defaults: ReadonlyArray<string>,
	baseDir: string,
): Read<ReadonlyArray<SourceRoot>> {
	const where = "project.sourceRoots";
	if (obj[key] === undefined || obj[key] === null) {
		return Either.right(defaults.map((p) => ({ path: path.resolve(baseDir, p), enabled: true })));
	}
	return Either.flatMap(optionalArray(obj, key, where), (entries) =>
		Either.all(
			entries.map((entry, i): Read<SourceRoot> => {
				if (typeof entry === "string") {
					return Either.right({ path: path.resolve(baseDir, entry), enabled: true });
				}
				return Either.gen(function* () {
					const root = yield* objectAt(entry, `${where}.${key}[${i}]`);
					const rootPath = yield* requiredString(root, "path", `${where}.${key}[${i}]`);
					const enabled = yield* optionalBoolean(root, "enabled", `${where}.${key}[${i}]`);
					return { path: path.resolve(baseDir, rootPath), enabled: enabled ?? true };
				});
			}),
		),
	);
}

function parseDependency(
	value: JSONValue,
	where: string,
	baseDir: string,
): Read<DeclaredArtifact> {
	return Either.gen(function* () {
		const obj = yield* objectAt(value, where);
		const file = yield* optionalString(obj, "file", where);
		return {
			groupId: yield* requiredString(obj, "groupId", where),
			artifactId: yield* requiredString(obj, "artifactId", where),
			version: yield* requiredString(obj, "version", where),
			file: Option.map(Option.fromNullable(file), (f) => path.resolve(baseDir, f)),
		};
	});
}

function parseExecution(value: JSONValue, where: string): Read<PluginExecution> {
	return Either.gen(function* () {
		const obj = yield* objectAt(value, where);
		return {
			id: (yield* optionalString(obj, "id", where)) ?? "default",
			goals: (yield* optionalStringArray(obj, "goals", where)) ?? [],
			configuration: yield* stringRecord(obj, "configuration", where),
		};
	});
}

function parsePlugin(value: JSONValue, where: string): Read<BuildPlugin> {
	return Either.gen(function* () {
		const obj = yield* objectAt(value, where);
		const executions = yield* optionalArray(obj, "executions", where);
		return {
			groupId: yield* requiredString(obj, "groupId", where),
			artifactId: yield* requiredString(obj, "artifactId", where),
			configuration: yield* stringRecord(obj, "configuration", where),
			executions: yield* Either.all(
				executions.map((e, i) => parseExecution(e, `${where}.executions[${i}]`)),
			),
		};
	});
}

function parseToolchain(
	obj: JSONObject,
	baseDir: string,
): Read<Option.Option<Toolchain>> {
	return Either.gen(function* () {
		const toolchain = yield* optionalObject(obj, "toolchain", "project");
		if (toolchain === undefined) return Option.none();
		const home = yield* requiredString(toolchain, "home", "project.toolchain");
		const version = yield* optionalString(toolchain, "version", "project.toolchain");
		return Option.some({
			home: path.resolve(baseDir, home),
			version: Option.fromNullable(version),
		});
	});
}

/**
 * Validate the `project` section.
 *
 * @param configDir Directory of the description file; `baseDir` is relative to it
 * @pure true
 */
export function parseProject(
	project: JSONObject,
	configDir: string,
	env: ConfigEnvironment,
): Read<BuildContext> {
	return Either.gen(function* () {
		const where = "project";
		const baseDir = path.resolve(
			configDir,
			(yield* optionalString(project, "baseDir", where)) ?? ".",
		);
		const roots = (yield* optionalObject(project, "sourceRoots", where)) ?? {};
		const dependencies = yield* optionalArray(project, "dependencies", where);
		const plugins = yield* optionalArray(project, "plugins", where);
		const runtime = yield* optionalString(project, "runtimeJavaVersion", where);
		const localRepository = yield* optionalString(project, "localRepository", where);
		const remotes = yield* optionalStringArray(project, "remoteRepositories", where);

		return {
			baseDir,
			buildDirectory: path.resolve(
				baseDir,
				(yield* optionalString(project, "buildDirectory", where)) ?? "target",
			),
			packaging: (yield* optionalString(project, "packaging", where)) ?? "jar",
			mainSourceRoots: yield* parseSourceRoots(roots, "main", DEFAULT_MAIN_ROOTS, baseDir),
			testSourceRoots: yield* parseSourceRoots(roots, "test", DEFAULT_TEST_ROOTS, baseDir),
			classpathElements: ((yield* optionalStringArray(project, "classpath", where)) ?? []).map(
				(p) => path.resolve(baseDir, p),
			),
			dependencies: yield* Either.all(
				dependencies.map((d, i) => parseDependency(d, `${where}.dependencies[${i}]`, baseDir)),
			),
			plugins: yield* Either.all(
				plugins.map((p, i) => parsePlugin(p, `${where}.plugins[${i}]`)),
			),
			properties: yield* stringRecord(project, "properties", where),
			toolchain: yield* parseToolchain(project, baseDir),
			runtimeJavaVersion: Option.fromNullable(runtime),
			localRepository:
				localRepository === undefined
					? path.join(env.homeDir, ".m2", "repository")
					: path.resolve(baseDir, localRepository),
			remoteRepositories: remotes ?? [DEFAULT_REMOTE_REPOSITORY],
			hostResourceLocations: yield* stringRecord(project, "hostResourceLocations", where),
		};
	});
}

/**
 * Validate the optional `checker` section into option overrides.
 *
 * @pure true
 */
export function parseCheckerSection(
	checker: JSONObject,
): Read<OptionOverrides> {
	return Either.gen(function* () {
		const where = "checker";
		const overrides: OptionOverrides = {};
		setIfDefined(overrides, "processors", yield* optionalStringArray(checker, "processors", where));
		setIfDefined(overrides, "checkerVersion", yield* optionalString(checker, "version", where));
		setIfDefined(overrides, "extraArgs", yield* optionalStringArray(checker, "extraArgs", where));
		setIfDefined(overrides, "skip", yield* optionalBoolean(checker, "skip", where));
		setIfDefined(overrides, "procOnly", yield* optionalBoolean(checker, "procOnly", where));
		setIfDefined(overrides, "failOnError", yield* optionalBoolean(checker, "failOnError", where));
		setIfDefined(overrides, "excludeTests", yield* optionalBoolean(checker, "excludeTests", where));
		setIfDefined(
			overrides,
			"suppressLombokWarnings",
			yield* optionalBoolean(checker, "suppressLombokWarnings", where),
		);
		setIfDefined(overrides, "executable", yield* optionalString(checker, "executable", where));
		setIfDefined(overrides, "includes", yield* optionalStringArray(checker, "includes", where));
		setIfDefined(overrides, "excludes", yield* optionalStringArray(checker, "excludes", where));
		setIfDefined(overrides, "offline", yield* optionalBoolean(checker, "offline", where));
		return overrides;
	});
}

/**
 * Validate a whole build description.
 *
 * @example
 * ```ts
 * parseConfig({ project: { baseDir: "app" } }, "/work", { homeDir: "/home/u" })
 * // Right({ build: { baseDir: "/work/app", packaging: "jar", ... }, options: {} })
 * ```
 * @pure true
 */
export function parseConfig(
	value: JSONValue,
	configDir: string,
	env: ConfigEnvironment,
): Read<LoadedConfig> {
	return Either.gen(function* () {
		if (!isJSONObject(value)) {
			return yield* Either.left(new ConfigError({ detail: "build description must be a JSON object" }));
		}
		const project = (yield* optionalObject(value, "project", "")) ?? {};
		const checker = (yield* optionalObject(value, "checker", "")) ?? {};
		return {
			build: yield* parseProject(project, configDir, env),
			options: yield* parseCheckerSection(checker),
		};
	});
}

const isNotFound = (error: unknown): boolean =>
	error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Read and validate a build description file.
 *
 * A missing file is an error only when `required`; otherwise the directory
 * of `file` is treated as a conventionally laid out project.
 *
 * @effect Effect<LoadedConfig, ConfigError, never>
 */
export function loadConfig(
	file: string,
	required: boolean,
	env: ConfigEnvironment = { homeDir: os.homedir() },
): Effect.Effect<LoadedConfig, ConfigError> {
	const absolute = path.resolve(file);
	return Effect.gen(function* () {
		const raw = yield* Effect.tryPromise({
			try: () => fs.readFile(absolute, "utf8"),
			catch: (error) => error,
		}).pipe(
			Effect.map(Option.some),
			Effect.catchAll((error) =>
				isNotFound(error) && !required
					? Effect.succeed(Option.none<string>())
					: Effect.fail(
							new ConfigError({
								detail: error instanceof Error ? error.message : String(error),
								path: absolute,
							}),
						),
			),
		);
		if (Option.isNone(raw)) {
			yield* Effect.logDebug(`No ${path.basename(absolute)} found; using conventional layout.`);
		}
		const value = yield* Effect.try({
			try: (): JSONValue => JSON.parse(Option.getOrElse(raw, () => "{}")),
			catch: (error) =>
				new ConfigError({
					detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
					path: absolute,
				}),
		});
		return yield* Either.match(parseConfig(value, path.dirname(absolute), env), {
			onLeft: (error) => Effect.fail(new ConfigError({ detail: error.detail, path: absolute })),
			onRight: (config) => Effect.succeed(config),
		});
	});
}
