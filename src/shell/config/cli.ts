// CHANGE: Command-line parsing for checker-runner
// PURITY: SHELL (reads process.argv by default)
// INVARIANT: Flags only override what they name; unknown flags are rejected
// COMPLEXITY: O(n) where n = number of arguments

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { CheckerOptions, OptionOverrides } from "../../core/types/index.js";

/**
 * Parsed command line.
 *
 * @property configFile Build description path; absent means the default file
 * @property overrides Option values given as flags
 * @property debug Print debug log lines
 */
export interface CLIOptions {
	readonly configFile?: string;
	readonly overrides: OptionOverrides;
	readonly debug: boolean;
}

type ParseState = CLIOptions;

type ListKey = "processors" | "extraArgs" | "includes" | "excludes";
type ValueKey = "checkerVersion" | "executable";
type BooleanKey =
	| "skip"
	| "procOnly"
	| "failOnError"
	| "excludeTests"
	| "suppressLombokWarnings"
	| "offline";

type FlagHandler =
	| { readonly takesValue: false; readonly apply: (state: ParseState) => ParseState }
	| {
			readonly takesValue: true;
			readonly apply: (state: ParseState, value: string) => ParseState;
	  };

const splitList = (value: string): ReadonlyArray<string> =>
	value
		.split(",")
		.map((s) => s.trim())
		.filter((s) => s.length > 0);

function withOverride<K extends keyof CheckerOptions>(
	state: ParseState,
	key: K,
	value: CheckerOptions[K],
): ParseState {
	const overrides: OptionOverrides = { ...state.overrides };
	overrides[key] = value;
	return { ...state, overrides };
}

function appendList(key: ListKey, split: boolean): FlagHandler {
	return {
		takesValue: true,
		apply: (state, value) =>
			withOverride(state, key, [
				...(state.overrides[key] ?? []),
				...(split ? splitList(value) : [value]),
			]),
	};
}

function setValue(key: ValueKey): FlagHandler {
	return {
		takesValue: true,
		apply: (state, value) => withOverride(state, key, value),
	};
}

function setFlag(key: BooleanKey, value: boolean): FlagHandler {
	return {
		takesValue: false,
		apply: (state) => withOverride(state, key, value),
	};
}

const handlers: Readonly<Record<string, FlagHandler>> = {
	"--config": {
		takesValue: true,
		apply: (state, value) => ({ ...state, configFile: value }),
	},
	"--processor": appendList("processors", true),
	"--extra-arg": appendList("extraArgs", false),
	"--include": appendList("includes", false),
	"--exclude": appendList("excludes", false),
	"--checker-version": setValue("checkerVersion"),
	"--executable": setValue("executable"),
	"--skip": setFlag("skip", true),
	"--no-proc-only": setFlag("procOnly", false),
	"--no-fail-on-error": setFlag("failOnError", false),
	"--exclude-tests": setFlag("excludeTests", true),
	"--no-suppress-lombok-warnings": setFlag("suppressLombokWarnings", false),
	"--offline": setFlag("offline", true),
	"--debug": { takesValue: false, apply: (state) => ({ ...state, debug: true }) },
};

/**
 * Parse command-line arguments.
 *
 * `--flag=value` and `--flag value` are equivalent. A single positional
 * argument names the build description.
 *
 * @param args Arguments without the node and script entries
 * @returns Parsed options or a ConfigError naming the offending argument
 *
 * @example
 * ```ts
 * parseCLIArgs(["build.json", "--processor", "nullness,interning", "--offline"])
 * // Right({ configFile: "build.json", debug: false,
 * //         overrides: { processors: ["nullness", "interning"], offline: true } })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CLIOptions, ConfigError> {
	let state: ParseState = { overrides: {}, debug: false };

	for (let i = 0; i < args.length; i++) {
		const arg = args[i] ?? "";
		if (arg.length === 0) continue;

		if (!arg.startsWith("--")) {
			if (state.configFile !== undefined) {
				return Either.left(new ConfigError({ detail: `unexpected argument '${arg}'` }));
			}
			state = { ...state, configFile: arg };
			continue;
		}

		const eq = arg.indexOf("=");
		const name = eq === -1 ? arg : arg.slice(0, eq);
		const handler = handlers[name];
		if (handler === undefined) {
			return Either.left(new ConfigError({ detail: `unknown option '${name}'` }));
		}
		if (!handler.takesValue) {
			if (eq !== -1) {
				return Either.left(new ConfigError({ detail: `option '${name}' takes no value` }));
			}
			state = handler.apply(state);
			continue;
		}

		const inline = eq === -1 ? undefined : arg.slice(eq + 1);
		const value = inline ?? args[i + 1];
		if (value === undefined) {
			return Either.left(new ConfigError({ detail: `option '${name}' requires a value` }));
		}
		if (inline === undefined) i++;
		state = handler.apply(state, value);
	}

	return Either.right(state);
}
