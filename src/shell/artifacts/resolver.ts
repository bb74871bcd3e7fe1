// CHANGE: Ordered fallback resolution of support artifacts
// PURITY: SHELL (filesystem, network through RemoteRepository)
// EFFECT: Effect<ResolvedArtifact, never, never> per lookup
// FORMAT THEOREM:
//   resolve(c) = first Some among [declared, local-cache, remote, marker](c), else absent
//   ∀ run, ∀ (group, name): each tier is consulted at most once
// INVARIANT: Tier failures are logged and never propagate
// COMPLEXITY: O(t) tier attempts per artifact, t = |tiers|

import * as fs from "node:fs";

import { Effect, Option, Ref } from "effect";

import {
	artifactKey,
	formatCoordinates,
	localCachePath,
	locationToPath,
	remoteUrl,
	type ResolvedArtifact,
} from "../../core/artifacts/coordinates.js";
import { ResolutionError } from "../../core/errors.js";
import type {
	ArtifactCoordinates,
	BuildContext,
	CheckerOptions,
} from "../../core/types/index.js";
import { CHECKER_GROUP_ID } from "../../core/version/checker-version.js";
import { RemoteRepository } from "./remote.js";

/**
 * One source of artifacts. `None` means "not here", a failure means "could not look".
 */
export interface ResolutionTier {
	readonly name: string;
	readonly resolve: (
		request: ArtifactCoordinates,
	) => Effect.Effect<Option.Option<ResolvedArtifact>, ResolutionError>;
}

export interface ArtifactResolver {
	readonly resolve: (request: ArtifactCoordinates) => Effect.Effect<ResolvedArtifact>;
}

/** The artifact the host's own class loader can vouch for. */
export const MARKER_ARTIFACT = {
	groupId: CHECKER_GROUP_ID,
	artifactId: "checker-qual",
} as const;

/** A class known to live inside checker-qual. */
export const MARKER_RESOURCE =
	"org/checkerframework/checker/nullness/qual/NonNull.class";

const found = (
	coordinates: ArtifactCoordinates,
	file: string,
	tier: string,
): Option.Option<ResolvedArtifact> =>
	Option.some({ ...coordinates, file: Option.some(file), tier: Option.some(tier) });

const fileExists = (
	tier: string,
	request: ArtifactCoordinates,
	file: string,
): Effect.Effect<boolean, ResolutionError> =>
	Effect.try({
		try: () => fs.statSync(file, { throwIfNoEntry: false })?.isFile() ?? false,
		catch: (error) =>
			new ResolutionError({
				tier,
				coordinates: formatCoordinates(request),
				detail: String(error),
			}),
	});

/**
 * Tier 1: the build's own resolved dependencies. A project-pinned version wins.
 */
export const declaredDependencyTier = (
	ctx: Pick<BuildContext, "dependencies">,
): ResolutionTier => ({
	name: "declared-dependency",
	resolve: (request) =>
		Effect.gen(function* () {
			const match = ctx.dependencies.find(
				(a) =>
					a.groupId === request.groupId && a.artifactId === request.artifactId,
			);
			if (match === undefined || Option.isNone(match.file)) return Option.none();
			const file = match.file.value;
			const exists = yield* fileExists("declared-dependency", request, file);
			return exists
				? found(
						{
							groupId: match.groupId,
							artifactId: match.artifactId,
							version: match.version,
						},
						file,
						"declared-dependency",
					)
				: Option.none();
		}),
});

/**
 * Tier 2: conventional local repository path, existence check only.
 */
export const localCacheTier = (
	ctx: Pick<BuildContext, "localRepository">,
): ResolutionTier => ({
	name: "local-cache",
	resolve: (request) => {
		const file = localCachePath(ctx.localRepository, request);
		return fileExists("local-cache", request, file).pipe(
			Effect.map((exists) =>
				exists ? found(request, file, "local-cache") : Option.none(),
			),
		);
	},
});

/**
 * Tier 3: remote repositories, in order, downloading into the local repository.
 */
export const remoteTier = (
	ctx: Pick<BuildContext, "localRepository" | "remoteRepositories">,
): Effect.Effect<ResolutionTier, never, RemoteRepository> =>
	Effect.map(RemoteRepository, (remote) => ({
		name: "remote",
		resolve: (request) =>
			Effect.gen(function* () {
				const destination = localCachePath(ctx.localRepository, request);
				let lastError: ResolutionError | undefined;
				for (const base of ctx.remoteRepositories) {
					const attempt = yield* Effect.either(
						remote.download(remoteUrl(base, request), destination),
					);
					if (attempt._tag === "Right") {
						return found(request, attempt.right, "remote");
					}
					lastError = attempt.left;
				}
				if (lastError !== undefined) return yield* Effect.fail(lastError);
				return Option.none();
			}),
	}));

/**
 * Tier 4: the on-disk file backing a marker resource the host has already
 * loaded. Applies to MARKER_ARTIFACT only.
 */
export const markerResourceTier = (
	ctx: Pick<BuildContext, "hostResourceLocations">,
): ResolutionTier => ({
	name: "host-class-location",
	resolve: (request) =>
		Effect.gen(function* () {
			if (
				request.groupId !== MARKER_ARTIFACT.groupId ||
				request.artifactId !== MARKER_ARTIFACT.artifactId
			) {
				return Option.none();
			}
			const location = Option.flatMap(
				Option.fromNullable(ctx.hostResourceLocations[MARKER_RESOURCE]),
				locationToPath,
			);
			if (Option.isNone(location)) return Option.none();
			const exists = yield* fileExists(
				"host-class-location",
				request,
				location.value,
			);
			return exists
				? found(request, location.value, "host-class-location")
				: Option.none();
		}),
});

/**
 * Tiers in priority order for a build; the remote tier is left out offline.
 */
export function standardTiers(
	ctx: BuildContext,
	options: Pick<CheckerOptions, "offline">,
): Effect.Effect<ReadonlyArray<ResolutionTier>, never, RemoteRepository> {
	return Effect.gen(function* () {
		const remote = options.offline ? [] : [yield* remoteTier(ctx)];
		return [
			declaredDependencyTier(ctx),
			localCacheTier(ctx),
			...remote,
			markerResourceTier(ctx),
		];
	});
}

const absent = (request: ArtifactCoordinates): ResolvedArtifact => ({
	...request,
	file: Option.none(),
	tier: Option.none(),
});

function tryTiers(
	tiers: ReadonlyArray<ResolutionTier>,
	request: ArtifactCoordinates,
): Effect.Effect<ResolvedArtifact> {
	return Effect.gen(function* () {
		const label = formatCoordinates(request);
		for (const tier of tiers) {
			const attempt = yield* Effect.either(tier.resolve(request));
			if (attempt._tag === "Left") {
				yield* Effect.logWarning(
					`Could not resolve ${label} via ${tier.name}: ${attempt.left.detail}`,
				);
				continue;
			}
			if (Option.isSome(attempt.right)) {
				const resolved = attempt.right.value;
				yield* Effect.logDebug(
					`Resolved ${label} via ${tier.name}: ${Option.getOrElse(resolved.file, () => "")}`,
				);
				return resolved;
			}
		}
		yield* Effect.logWarning(`Could not resolve ${label} from any source.`);
		return absent(request);
	});
}

/**
 * Build a run-scoped resolver. Results are cached per (group, name), so the
 * tiers are consulted at most once for each artifact during the run.
 */
export function makeArtifactResolver(
	tiers: ReadonlyArray<ResolutionTier>,
): Effect.Effect<ArtifactResolver> {
	return Effect.gen(function* () {
		const cache = yield* Ref.make<ReadonlyMap<string, ResolvedArtifact>>(new Map());
		return {
			resolve: (request) =>
				Effect.gen(function* () {
					const key = artifactKey(request);
					const cached = (yield* Ref.get(cache)).get(key);
					if (cached !== undefined) return cached;
					const resolved = yield* tryTiers(tiers, request);
					yield* Ref.update(cache, (m) => new Map([...m, [key, resolved]]));
					return resolved;
				}),
		};
	});
}
