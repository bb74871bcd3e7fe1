// CHANGE: Central export file for all type definitions
// PURITY: CORE (re-exports only)

export type {
	ArtifactCoordinates,
	BuildContext,
	BuildPlugin,
	DeclaredArtifact,
	PluginConfiguration,
	PluginExecution,
	SourceRoot,
	Toolchain,
} from "./build.js";
export type { CheckerOptions, OptionOverrides } from "./options.js";
export { applyOverrides, DEFAULT_OPTIONS } from "./options.js";
