// CHANGE: Barrel for configuration loading and command-line parsing
// PURITY: SHELL (re-exports only)

export { type CLIOptions, parseCLIArgs } from "./cli.js";
export {
	type ConfigEnvironment,
	DEFAULT_CONFIG_FILE,
	type LoadedConfig,
	loadConfig,
	parseConfig,
} from "./loader.js";
