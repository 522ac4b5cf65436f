// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: SHELL internals stay hidden except the LintRunner service seam
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Sweep orchestrator for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runSweep } from "mdsweep";
 *
 * const exitCode = await Effect.runPromise(
 *   runSweep({ targetPath: "docs", mode: "scan", listOnly: false, noPreflight: false }),
 * );
 * ```
 *
 * @returns Effect<ExitCode> (0 = no genuine lint failures, 1 otherwise)
 */
export {
	collectFiles,
	defaultLintRunnerLayer,
	type LintRunnerLayerFactory,
	lintFiles,
	runSweep,
	sweep,
} from "./app/runSweep.js";

// ═══════════════════════════════════════════════════════════════════════════════
// LINTER CAPABILITY (swap for a fake in tests)
// ═══════════════════════════════════════════════════════════════════════════════

export {
	LintRunner,
	type LintRunnerOptions,
	type LintRunnerShape,
	lintRunnerLive,
} from "./shell/lint/lint-runner.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES (Immutable Domain Models)
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	DecisionState,
	ExclusionPattern,
	ExitCode,
	LintMode,
	LintOutcome,
	LintRunResult,
	RunSummary,
	SkippedFile,
} from "./core/models.js";
export type {
	CLIOptions,
	LinterCommand,
	SweepConfig,
	SweepSettings,
} from "./core/types/index.js";
export { CONFIG_FILE_NAME, DEFAULT_CONFIG } from "./core/types/index.js";
export {
	ConfigError,
	ExternalToolError,
	FSError,
	PreflightFailed,
	type AppError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode, toDecisionState } from "./core/decision.js";
export {
	buildExclusionPatterns,
	directoryPattern,
	parseGitignore,
	parseGitignoreLine,
	TOOLING_EXCLUSION,
} from "./core/ignore/gitignore.js";
export {
	canPruneDirectory,
	filterExcluded,
	isExcluded,
} from "./core/ignore/exclusion.js";
export {
	matchesWildcard,
	toMatchPath,
	wildcardToRegExp,
} from "./core/ignore/wildcard.js";
export {
	buildLintArgs,
	classifyLintResult,
	findCrashMarker,
} from "./core/lint/classify.js";
export { recordOutcome, summarize } from "./core/lint/summary.js";
export { resolveConfigPath, resolveSettings } from "./core/settings.js";
