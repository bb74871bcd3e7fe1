// CHANGE: Specs for source and runtime version detection
// INVARIANT: Accepted runs have both versions ≥ 8

import { Effect, Either, Layer, Option } from "effect";
import { describe, expect, it } from "vitest";

import { fixedJavaRuntime, JavaRuntimeProbe } from "../../../src/shell/runtime/java-runtime.js";
import { detectVersions } from "../../../src/shell/version/detector.js";
import { buildContext } from "../../utils/builders.js";
import { captureLogs } from "../../utils/logs.js";

const noProbe = Layer.succeed(JavaRuntimeProbe, {
	javaVersion: Effect.die("runtime must not be probed"),
});

describe("detectVersions", () => {
	it("prefers the toolchain's declared version over the probe", () => {
		const ctx = buildContext("/p", {
			properties: { "maven.compiler.source": "1.8" },
			toolchain: Option.some({ home: "/jdk8", version: Option.some("1.8") }),
		});
		const versions = Effect.runSync(detectVersions(ctx).pipe(Effect.provide(noProbe)));
		expect(versions).toEqual({ sourceVersion: 8, runtimeVersion: 8 });
	});

	it("uses the host-reported runtime version before probing", () => {
		const ctx = buildContext("/p", {
			properties: { "maven.compiler.release": "x", "maven.compiler.target": "11" },
			runtimeJavaVersion: Option.some("17.0.2"),
		});
		const versions = Effect.runSync(detectVersions(ctx).pipe(Effect.provide(noProbe)));
		expect(versions).toEqual({ sourceVersion: 11, runtimeVersion: 17 });
	});

	it("probes when the toolchain declares no version", () => {
		const ctx = buildContext("/p", {
			properties: { "maven.compiler.source": "21" },
			toolchain: Option.some({ home: "/jdk", version: Option.none() }),
		});
		const versions = Effect.runSync(
			detectVersions(ctx).pipe(Effect.provide(fixedJavaRuntime("21.0.1"))),
		);
		expect(versions).toEqual({ sourceVersion: 21, runtimeVersion: 21 });
	});

	it("assumes the runtime version for an unset source version", () => {
		const logs = captureLogs();
		const versions = Effect.runSync(
			detectVersions(buildContext("/p")).pipe(
				Effect.provide(Layer.merge(fixedJavaRuntime("11"), logs.layer)),
			),
		);
		expect(versions).toEqual({ sourceVersion: 11, runtimeVersion: 11 });
		expect(logs.lines).toContain(
			"[WARNING] No maven.compiler.source or maven.compiler.target configured; assuming source version 11.",
		);
	});

	it("rejects a pre-8 source version", () => {
		const ctx = buildContext("/p", { properties: { "maven.compiler.source": "1.7" } });
		const result = Effect.runSync(
			Effect.either(detectVersions(ctx).pipe(Effect.provide(fixedJavaRuntime("17")))),
		);
		expect(Either.isLeft(result) && result.left).toMatchObject({
			_tag: "VersionRequirementError",
			subject: "source",
			raw: "1.7",
			version: 7,
		});
	});

	it("rejects an unknown runtime version", () => {
		const unknown = Layer.succeed(JavaRuntimeProbe, { javaVersion: Effect.succeed(Option.none()) });
		const result = Effect.runSync(
			Effect.either(detectVersions(buildContext("/p")).pipe(Effect.provide(unknown))),
		);
		expect(Either.isLeft(result) && result.left).toMatchObject({
			_tag: "VersionRequirementError",
			subject: "runtime",
			raw: "",
			version: -1,
		});
	});
});
