// CHANGE: Crawl source roots for the files handed to the compiler
// PURITY: SHELL (filesystem traversal)
// EFFECT: Effect<ReadonlyArray<string>, FSError>
// INVARIANT: Result is absolute, de-duplicated, sorted per root, roots in input order
// COMPLEXITY: O(f) where f = files under the roots

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";
import { fdir } from "fdir";
import picomatch, { type PicomatchOptions } from "picomatch";

import { FSError } from "../../core/errors.js";

export interface ScanPatterns {
	readonly includes: ReadonlyArray<string>;
	readonly excludes: ReadonlyArray<string>;
}

const toPosix = (p: string): string => p.split(path.sep).join(path.posix.sep);

function scanRoot(root: string, patterns: ScanPatterns): ReadonlyArray<string> {
	const absRoot = path.resolve(root);
	if (!(fs.statSync(absRoot, { throwIfNoEntry: false })?.isDirectory() ?? false)) {
		return [];
	}
	const matchOptions: PicomatchOptions = { dot: true };
	const included: (file: string) => boolean = picomatch([...patterns.includes], matchOptions);
	const excluded: (file: string) => boolean =
		patterns.excludes.length > 0
			? picomatch([...patterns.excludes], matchOptions)
			: () => false;

	// Symlinked directories are walked; paths stay under the root
	return new fdir()
		.withFullPaths()
		.withSymlinks({ resolvePaths: false })
		.filter((file) => {
			const relative = toPosix(path.relative(absRoot, file));
			return included(relative) && !excluded(relative);
		})
		.crawl(absRoot)
		.sync()
		.sort();
}

/**
 * Every file under `roots` matching an include pattern and no exclude pattern.
 * Roots that do not exist contribute nothing.
 *
 * @effect Effect<ReadonlyArray<string>, FSError>
 */
export function scanSources(
	roots: ReadonlyArray<string>,
	patterns: ScanPatterns,
): Effect.Effect<ReadonlyArray<string>, FSError> {
	return Effect.try({
		try: () => {
			const seen = new Set<string>();
			const files: string[] = [];
			for (const root of roots) {
				for (const file of scanRoot(root, patterns)) {
					if (seen.has(file)) continue;
					seen.add(file);
					files.push(file);
				}
			}
			return files;
		},
		catch: (error) =>
			new FSError({ detail: `Failed to scan sources: ${String(error)}` }),
	});
}
