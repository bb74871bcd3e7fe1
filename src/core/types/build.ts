// CHANGE: Read-only model of the Java build handed over by the build host
// PURITY: CORE
// INVARIANT: All structures are immutable; the planner only reads them
// COMPLEXITY: O(1)

import type { Option } from "effect";

/**
 * Maven-style artifact coordinates.
 *
 * @property groupId e.g. "org.checkerframework"
 * @property artifactId e.g. "checker-qual"
 * @property version e.g. "3.53.0"
 */
export interface ArtifactCoordinates {
	readonly groupId: string;
	readonly artifactId: string;
	readonly version: string;
}

/**
 * A dependency the build already resolved. `file` is absent when the host
 * knows the coordinates but never materialized the jar.
 */
export interface DeclaredArtifact extends ArtifactCoordinates {
	readonly file: Option.Option<string>;
}

/**
 * A source directory that can be switched off by the host.
 */
export interface SourceRoot {
	readonly path: string;
	readonly enabled: boolean;
}

/**
 * Plugin-level or execution-level configuration: flat key → value pairs.
 */
export type PluginConfiguration = Readonly<Record<string, string>>;

export interface PluginExecution {
	readonly id: string;
	readonly goals: ReadonlyArray<string>;
	readonly configuration: PluginConfiguration;
}

export interface BuildPlugin {
	readonly groupId: string;
	readonly artifactId: string;
	readonly configuration: PluginConfiguration;
	readonly executions: ReadonlyArray<PluginExecution>;
}

/**
 * A JDK toolchain selected by the build.
 *
 * `version` is a capability, not a guess: toolchains that do not declare
 * their version carry `Option.none()`.
 */
export interface Toolchain {
	readonly home: string;
	readonly version: Option.Option<string>;
}

/**
 * Everything the planner reads from the Java build.
 *
 * @property baseDir Absolute project root (`${project.basedir}`)
 * @property buildDirectory Absolute build output directory (`${project.build.directory}`)
 * @property packaging Packaging type; "pom" marks a non-code aggregator
 * @property classpathElements Compile classpath, in order
 * @property runtimeJavaVersion `java.version` of the runtime executing the build, when the host reports it
 * @property localRepository Absolute path of the local artifact cache
 * @property remoteRepositories Base URLs tried in order by the remote tier
 * @property hostResourceLocations Marker resource name → location URL as seen by the host's class loader
 */
export interface BuildContext {
	readonly baseDir: string;
	readonly buildDirectory: string;
	readonly packaging: string;
	readonly mainSourceRoots: ReadonlyArray<SourceRoot>;
	readonly testSourceRoots: ReadonlyArray<SourceRoot>;
	readonly classpathElements: ReadonlyArray<string>;
	readonly dependencies: ReadonlyArray<DeclaredArtifact>;
	readonly plugins: ReadonlyArray<BuildPlugin>;
	readonly properties: Readonly<Record<string, string>>;
	readonly toolchain: Option.Option<Toolchain>;
	readonly runtimeJavaVersion: Option.Option<string>;
	readonly localRepository: string;
	readonly remoteRepositories: ReadonlyArray<string>;
	readonly hostResourceLocations: Readonly<Record<string, string>>;
}
