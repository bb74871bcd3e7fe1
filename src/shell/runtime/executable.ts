// CHANGE: Locate the compiler executable, preferring an explicit path, then the toolchain
// PURITY: SHELL (filesystem existence check)
// INVARIANT: Returns an absolute path when the executable exists on disk; otherwise a toolchain path or the bare name
// COMPLEXITY: O(1)

import * as fs from "node:fs";
import * as path from "node:path";

import { Option } from "effect";

import type { Toolchain } from "../../core/types/index.js";

/**
 * Resolve the executable to launch.
 *
 * @param executable Name ("javac") or path ("/opt/jdk/bin/javac")
 * @param toolchain Toolchain selected by the build, if any
 */
export function executablePath(
	executable: string,
	toolchain: Option.Option<Toolchain>,
): string {
	if (fs.existsSync(executable)) return path.resolve(executable);
	return Option.match(toolchain, {
		onNone: () => executable,
		onSome: (tc) => path.join(tc.home, "bin", executable),
	});
}

/**
 * The `java` launcher needs an explicit classpath and main class; `javac` does not.
 *
 * @pure true
 */
export function isLauncher(executable: string): boolean {
	const base = path.basename(executable).toLowerCase();
	return base === "java" || base === "java.exe";
}
