// CHANGE: Specs for section ordering and command rendering
// PURITY: CORE
// INVARIANT: Token order depends on SECTION_ORDER only

import { describe, expect, it } from "vitest";

import {
	argFileEntry,
	classpathArgFile,
	renderCommand,
	shellQuote,
	sourceListArgFile,
} from "../../../src/core/invocation/render.js";
import { InvocationBuilder, SECTION_ORDER } from "../../../src/core/invocation/sections.js";

describe("InvocationBuilder", () => {
	it("orders tokens by section, not by call order", () => {
		const plan = InvocationBuilder.start("javac")
			.with("sourceReference", ["@/tmp/sources"])
			.with("processingMode", ["-proc:only"])
			.with("processorSelector", ["-processor", "a.B"])
			.with("moduleVisibility", ["-J--add-opens=x"])
			.build();
		expect(plan.tokens).toEqual([
			"javac",
			"-J--add-opens=x",
			"-processor",
			"a.B",
			"-proc:only",
			"@/tmp/sources",
		]);
	});

	it("replaces a section when set twice", () => {
		const plan = InvocationBuilder.start("javac")
			.with("extraArguments", ["-Awarns"])
			.with("extraArguments", ["-Alint"])
			.build();
		expect(plan.tokens).toEqual(["javac", "-Alint"]);
		expect(plan.sections.extraArguments).toEqual(["-Alint"]);
	});

	it("places bootstrap overlays before the processor path", () => {
		expect(SECTION_ORDER.indexOf("annotatedStdlib")).toBeLessThan(
			SECTION_ORDER.indexOf("processorPath"),
		);
		expect(SECTION_ORDER[0]).toBe("executable");
		expect(SECTION_ORDER[SECTION_ORDER.length - 1]).toBe("sourceReference");
	});
});

describe("render", () => {
	it("quotes only tokens the shell would split", () => {
		expect(shellQuote("-proc:only")).toBe("-proc:only");
		expect(shellQuote("@/tmp/a b")).toBe("'@/tmp/a b'");
		expect(shellQuote("it's")).toBe("'it'\\''s'");
		expect(shellQuote("")).toBe("''");
	});

	it("renders one token per line", () => {
		expect(renderCommand(["javac", "-processor", "a.B"])).toBe(
			"javac \\\n  -processor \\\n  a.B",
		);
	});

	it("quotes argument file entries containing whitespace", () => {
		expect(argFileEntry("/src/A.java")).toBe("/src/A.java");
		expect(argFileEntry("/my src/A.java")).toBe('"/my src/A.java"');
		expect(argFileEntry('C:\\my dir\\"x".jar')).toBe('"C:\\\\my dir\\\\\\"x\\".jar"');
	});

	it("writes the classpath as a single -cp entry", () => {
		expect(classpathArgFile(["/a.jar", "/b.jar"], ":")).toEqual(["-cp /a.jar:/b.jar"]);
		expect(classpathArgFile(["/lib dir/a.jar"], ":")).toEqual(['-cp "/lib dir/a.jar"']);
	});

	it("lists one source per line", () => {
		expect(sourceListArgFile(["/s/A.java", "/s dir/B.java"])).toEqual([
			"/s/A.java",
			'"/s dir/B.java"',
		]);
	});
});
