// CHANGE: Remote artifact retrieval into the local repository
// PURITY: SHELL (network, filesystem)
// EFFECT: Effect<string, ResolutionError, never>
// INVARIANT: A download either lands completely at `destination` or leaves nothing there
// COMPLEXITY: O(size of artifact)

import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Context, Effect, Layer } from "effect";

import { ResolutionError } from "../../core/errors.js";

/** Maven Central, used when the build names no repository. */
export const DEFAULT_REMOTE_REPOSITORY = "https://repo.maven.apache.org/maven2";

/**
 * Repository facility that may fetch an artifact over the network.
 */
export class RemoteRepository extends Context.Tag("RemoteRepository")<
	RemoteRepository,
	{
		/**
		 * Download `url` to `destination`.
		 * @returns the destination path
		 */
		readonly download: (
			url: string,
			destination: string,
		) => Effect.Effect<string, ResolutionError>;
	}
>() {}

async function downloadTo(url: string, destination: string): Promise<string> {
	const response = await fetch(url);
	if (!response.ok) {
		throw new Error(`HTTP ${response.status} ${response.statusText}`);
	}
	const directory = path.dirname(destination);
	await fs.mkdir(directory, { recursive: true });
	// One staging directory per download, removed on every path
	const staging = await fs.mkdtemp(path.join(directory, ".download-"));
	try {
		const partial = path.join(staging, path.basename(destination));
		await fs.writeFile(partial, Buffer.from(await response.arrayBuffer()));
		await fs.rename(partial, destination);
		return destination;
	} finally {
		await fs.rm(staging, { recursive: true, force: true });
	}
}

export const RemoteRepositoryLive = Layer.succeed(RemoteRepository, {
	download: (url, destination) =>
		Effect.tryPromise({
			try: () => downloadTo(url, destination),
			catch: (error) =>
				new ResolutionError({
					tier: "remote",
					coordinates: url,
					detail: error instanceof Error ? error.message : String(error),
				}),
		}),
});
