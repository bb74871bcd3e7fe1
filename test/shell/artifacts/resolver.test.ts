// CHANGE: Specs for tiered artifact resolution
// INVARIANT: Tiers are tried in order; a failing tier never aborts resolution

import * as path from "node:path";

import { Effect, Layer, Option } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ResolutionError } from "../../../src/core/errors.js";
import { RemoteRepository } from "../../../src/shell/artifacts/remote.js";
import {
	makeArtifactResolver,
	MARKER_RESOURCE,
	type ResolutionTier,
	standardTiers,
} from "../../../src/shell/artifacts/resolver.js";
import { artifact, buildContext } from "../../utils/builders.js";
import { captureLogs } from "../../utils/logs.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

const qual = { groupId: "org.checkerframework", artifactId: "checker-qual", version: "3.53.0" };

const unreachableRemote = Layer.succeed(RemoteRepository, {
	download: () => Effect.die("remote repository must not be used"),
});

const failingRemote = Layer.succeed(RemoteRepository, {
	download: (url) =>
		Effect.fail(new ResolutionError({ tier: "remote", coordinates: url, detail: "HTTP 404 Not Found" })),
});

describe("standardTiers", () => {
	let project: TempProject;

	beforeEach(() => {
		project = createTempProject();
	});

	afterEach(() => {
		project.cleanup();
	});

	it("prefers the declared dependency and its pinned version", async () => {
		const jar = project.file("libs/checker-qual-3.40.0.jar");
		project.file(".m2/repository/org/checkerframework/checker-qual/3.53.0/checker-qual-3.53.0.jar");
		const ctx = buildContext(project.root, {
			dependencies: [artifact("org.checkerframework", "checker-qual", "3.40.0", jar)],
		});

		const resolved = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeArtifactResolver(
					yield* standardTiers(ctx, { offline: false }),
				);
				return yield* resolver.resolve(qual);
			}).pipe(Effect.provide(unreachableRemote)),
		);

		expect(resolved.version).toBe("3.40.0");
		expect(resolved.file).toEqual(Option.some(jar));
		expect(resolved.tier).toEqual(Option.some("declared-dependency"));
	});

	it("uses the local cache when the declared jar is not materialized", async () => {
		const cached = project.file(
			".m2/repository/org/checkerframework/checker-qual/3.53.0/checker-qual-3.53.0.jar",
		);
		const ctx = buildContext(project.root, {
			dependencies: [artifact("org.checkerframework", "checker-qual", "3.53.0")],
		});

		const resolved = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeArtifactResolver(
					yield* standardTiers(ctx, { offline: false }),
				);
				return yield* resolver.resolve(qual);
			}).pipe(Effect.provide(unreachableRemote)),
		);

		expect(resolved.file).toEqual(Option.some(cached));
		expect(resolved.tier).toEqual(Option.some("local-cache"));
	});

	it("falls through a failing remote to the host class location", async () => {
		const hostJar = project.file("host lib/checker-qual.jar");
		const ctx = buildContext(project.root, {
			remoteRepositories: ["https://repo.example.org/maven2"],
			hostResourceLocations: {
				[MARKER_RESOURCE]: `jar:file:${hostJar.replace(" ", "%20")}!/${MARKER_RESOURCE}`,
			},
		});
		const logs = captureLogs();

		const resolved = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeArtifactResolver(
					yield* standardTiers(ctx, { offline: false }),
				);
				return yield* resolver.resolve(qual);
			}).pipe(Effect.provide(Layer.merge(failingRemote, logs.layer))),
		);

		expect(resolved.file).toEqual(Option.some(hostJar));
		expect(resolved.tier).toEqual(Option.some("host-class-location"));
		expect(logs.lines).toContain(
			"[WARNING] Could not resolve org.checkerframework:checker-qual:3.53.0 via remote: HTTP 404 Not Found",
		);
	});

	it("never consults the remote tier offline and reports absence", async () => {
		const ctx = buildContext(project.root, {
			remoteRepositories: ["https://repo.example.org/maven2"],
		});
		const checker = { ...qual, artifactId: "checker" };
		const logs = captureLogs();

		const resolved = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeArtifactResolver(
					yield* standardTiers(ctx, { offline: true }),
				);
				return yield* resolver.resolve(checker);
			}).pipe(Effect.provide(Layer.merge(unreachableRemote, logs.layer))),
		);

		expect(Option.isNone(resolved.file)).toBe(true);
		expect(logs.lines).toContain(
			"[WARNING] Could not resolve org.checkerframework:checker:3.53.0 from any source.",
		);
	});

	it("downloads into the local repository layout", async () => {
		const destinations: string[] = [];
		const recordingRemote = Layer.succeed(RemoteRepository, {
			download: (url, destination) => {
				destinations.push(`${url} -> ${destination}`);
				return Effect.succeed(destination);
			},
		});
		const ctx = buildContext(project.root, {
			remoteRepositories: ["https://repo.example.org/maven2"],
		});

		const resolved = await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeArtifactResolver(
					yield* standardTiers(ctx, { offline: false }),
				);
				return yield* resolver.resolve(qual);
			}).pipe(Effect.provide(recordingRemote)),
		);

		const expected = path.join(
			project.root,
			".m2/repository/org/checkerframework/checker-qual/3.53.0/checker-qual-3.53.0.jar",
		);
		expect(resolved.file).toEqual(Option.some(expected));
		expect(destinations).toEqual([
			`https://repo.example.org/maven2/org/checkerframework/checker-qual/3.53.0/checker-qual-3.53.0.jar -> ${expected}`,
		]);
	});
});

describe("makeArtifactResolver", () => {
	it("consults the tiers once per artifact", async () => {
		let calls = 0;
		const counting: ResolutionTier = {
			name: "counting",
			resolve: (request) =>
				Effect.sync(() => {
					calls++;
					return Option.some({
						...request,
						file: Option.some("/x.jar"),
						tier: Option.some("counting"),
					});
				}),
		};

		await Effect.runPromise(
			Effect.gen(function* () {
				const resolver = yield* makeArtifactResolver([counting]);
				yield* resolver.resolve(qual);
				yield* resolver.resolve({ ...qual, version: "3.0.0" });
			}),
		);

		expect(calls).toBe(1);
	});
});
