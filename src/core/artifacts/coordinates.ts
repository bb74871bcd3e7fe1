// CHANGE: Pure helpers over artifact coordinates and their on-disk locations
// PURITY: CORE
// INVARIANT: Path computations never touch the filesystem
// COMPLEXITY: O(|coordinates|)

import * as path from "node:path";

import { Option } from "effect";

import type { ArtifactCoordinates } from "../types/index.js";

/**
 * Result of resolving one artifact. `file` is absent when every tier failed.
 *
 * @invariant immutable once produced
 */
export interface ResolvedArtifact extends ArtifactCoordinates {
	readonly file: Option.Option<string>;
	readonly tier: Option.Option<string>;
}

/** Cache key: one resolution per (group, name) per run. */
export const artifactKey = (c: Pick<ArtifactCoordinates, "groupId" | "artifactId">): string =>
	`${c.groupId}:${c.artifactId}`;

export const formatCoordinates = (c: ArtifactCoordinates): string =>
	`${c.groupId}:${c.artifactId}:${c.version}`;

/**
 * Repository-layout relative path: `org/foo/bar/1.0/bar-1.0.jar`.
 *
 * @pure true
 */
export function repositoryPath(c: ArtifactCoordinates): string {
	return [
		...c.groupId.split("."),
		c.artifactId,
		c.version,
		`${c.artifactId}-${c.version}.jar`,
	].join("/");
}

/**
 * Conventional location of an artifact inside a local repository.
 *
 * @pure true
 */
export function localCachePath(
	localRepository: string,
	c: ArtifactCoordinates,
): string {
	return path.join(localRepository, ...repositoryPath(c).split("/"));
}

/**
 * Remote URL of an artifact under a repository base URL.
 *
 * @pure true
 */
export function remoteUrl(base: string, c: ArtifactCoordinates): string {
	const trimmed = base.endsWith("/") ? base.slice(0, -1) : base;
	return `${trimmed}/${repositoryPath(c)
		.split("/")
		.map((segment) => encodeURIComponent(segment))
		.join("/")}`;
}

const JAR_ENTRY_SEPARATOR = "!/";

/**
 * Turn a class-loader location into a filesystem path.
 *
 * Accepts `jar:file:/a/b.jar!/x/Y.class`, `file:/a/b.jar`, or a plain path,
 * URL-decoding the result (`%20` → space).
 *
 * @pure true
 * @returns None when the location is empty or not file-backed
 *
 * @example
 * ```ts
 * locationToPath("jar:file:/repo/my%20libs/q.jar!/a/B.class"); // Some("/repo/my libs/q.jar")
 * ```
 */
export function locationToPath(location: string): Option.Option<string> {
	let rest = location.trim();
	if (rest.startsWith("jar:")) rest = rest.slice("jar:".length);
	const entry = rest.indexOf(JAR_ENTRY_SEPARATOR);
	if (entry >= 0) rest = rest.slice(0, entry);

	if (/^[a-z][a-z0-9+.-]*:\/\//i.test(rest) && !rest.startsWith("file:")) {
		return Option.none();
	}
	if (rest.startsWith("file://")) rest = rest.slice("file://".length);
	else if (rest.startsWith("file:")) rest = rest.slice("file:".length);

	// Windows drive letters arrive as "/C:/…"
	if (/^\/[A-Za-z]:\//.test(rest)) rest = rest.slice(1);

	try {
		const decoded = decodeURIComponent(rest);
		return decoded.length > 0 ? Option.some(decoded) : Option.none();
	} catch {
		return Option.none();
	}
}
