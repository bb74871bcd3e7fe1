// CHANGE: Specs for source scanning with include/exclude patterns
// PURITY: SHELL (temporary directories)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { scanSources } from "../../../src/shell/sources/scan.js";
import { createTempProject, type TempProject } from "../../utils/tempProject.js";

describe("scanSources", () => {
	let project: TempProject;

	beforeEach(() => {
		project = createTempProject();
		project.file("src/main/java/com/acme/B.java");
		project.file("src/main/java/com/acme/A.java");
		project.file("src/main/java/com/acme/notes.txt");
		project.file("src/main/java/com/acme/gen/Generated.java");
		project.file("src/test/java/com/acme/ATest.java");
	});

	afterEach(() => {
		project.cleanup();
	});

	const main = (): string => path.join(project.root, "src/main/java");
	const test = (): string => path.join(project.root, "src/test/java");

	it("finds every Java file under each root, sorted per root", () => {
		const files = Effect.runSync(
			scanSources([main(), test()], { includes: ["**/*.java"], excludes: [] }),
		);
		expect(files).toEqual([
			path.join(main(), "com/acme/A.java"),
			path.join(main(), "com/acme/B.java"),
			path.join(main(), "com/acme/gen/Generated.java"),
			path.join(test(), "com/acme/ATest.java"),
		]);
	});

	it("applies exclude patterns relative to the root", () => {
		const files = Effect.runSync(
			scanSources([main()], { includes: ["**/*.java"], excludes: ["**/gen/**"] }),
		);
		expect(files).toEqual([
			path.join(main(), "com/acme/A.java"),
			path.join(main(), "com/acme/B.java"),
		]);
	});

	it("skips missing roots and duplicate roots", () => {
		const files = Effect.runSync(
			scanSources([test(), path.join(project.root, "absent"), test()], {
				includes: ["**/*.java"],
				excludes: [],
			}),
		);
		expect(files).toEqual([path.join(test(), "com/acme/ATest.java")]);
	});
});

describe("scanSources traversal", () => {
	let project: TempProject;

	beforeEach(() => {
		project = createTempProject();
	});

	afterEach(() => {
		project.cleanup();
	});

	it("walks symlinked package directories and reports paths under the root", () => {
		const main = project.dir("src/main/java");
		project.file("src/main/java/com/acme/A.java");
		const shared = project.dir("shared/com/shared");
		project.file("shared/com/shared/B.java");
		fs.symlinkSync(shared, path.join(main, "com/shared"), "dir");

		const files = Effect.runSync(
			scanSources([main], { includes: ["**/*.java"], excludes: [] }),
		);

		expect(files).toEqual([
			path.join(main, "com/acme/A.java"),
			path.join(main, "com/shared/B.java"),
		]);
	});

	it("includes files below directories whose names start with a dot", () => {
		const main = project.dir("src/main/java");
		project.file("src/main/java/com/acme/A.java");
		project.file("src/main/java/.apt/C.java");

		const files = Effect.runSync(
			scanSources([main], { includes: ["**/*.java"], excludes: [] }),
		);

		expect(files).toEqual([
			path.join(main, ".apt/C.java"),
			path.join(main, "com/acme/A.java"),
		]);
	});

	it("applies exclude patterns to dot directories", () => {
		const main = project.dir("src/main/java");
		project.file("src/main/java/com/acme/A.java");
		project.file("src/main/java/.apt/C.java");

		const files = Effect.runSync(
			scanSources([main], { includes: ["**/*.java"], excludes: [".apt/**"] }),
		);

		expect(files).toEqual([path.join(main, "com/acme/A.java")]);
	});
});
