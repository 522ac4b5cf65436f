// CHANGE: Central export file for type definitions
// SOURCE: n/a

export type {
	CLIOptions,
	LinterCommand,
	SweepConfig,
	SweepSettings,
} from "./config.js";
export { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./config.js";
export type { ExecCompletionError } from "./exec-helpers.js";
export {
	combineOutput,
	isOutputOverflow,
	isSpawnFailure,
	OUTPUT_OVERFLOW_CODE,
	toLintRunResult,
} from "./exec-helpers.js";
