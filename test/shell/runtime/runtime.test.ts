// CHANGE: Specs for Java runtime probing helpers and executable resolution

import * as path from "node:path";

import { Option } from "effect";
import { describe, expect, it } from "vitest";

import { executablePath, isLauncher } from "../../../src/shell/runtime/executable.js";
import { javaLauncher, parseJavaVersionOutput } from "../../../src/shell/runtime/java-runtime.js";

describe("parseJavaVersionOutput", () => {
	it("reads the quoted version", () => {
		expect(
			parseJavaVersionOutput('openjdk version "17.0.2" 2022-01-18\nOpenJDK Runtime Environment'),
		).toEqual(Option.some("17.0.2"));
		expect(parseJavaVersionOutput('java version "1.8.0_292"')).toEqual(Option.some("1.8.0_292"));
	});

	it("is None for unexpected output", () => {
		expect(Option.isNone(parseJavaVersionOutput("command not found"))).toBe(true);
	});
});

describe("javaLauncher", () => {
	it("uses JAVA_HOME when set", () => {
		expect(javaLauncher({ JAVA_HOME: "/opt/jdk" })).toBe(path.join("/opt/jdk", "bin", "java"));
		expect(javaLauncher({})).toBe("java");
	});
});

describe("executablePath", () => {
	it("prefixes a bare name with the toolchain's bin directory", () => {
		const toolchain = Option.some({ home: "/opt/jdk-17", version: Option.none() });
		expect(executablePath("no-such-javac", toolchain)).toBe(
			path.join("/opt/jdk-17", "bin", "no-such-javac"),
		);
		expect(executablePath("no-such-javac", Option.none())).toBe("no-such-javac");
	});

	it("recognizes the java launcher", () => {
		expect(isLauncher("/opt/jdk/bin/java")).toBe(true);
		expect(isLauncher("JAVA.EXE")).toBe(true);
		expect(isLauncher("javac")).toBe(false);
	});
});
