// CHANGE: Configuration and CLI option types for the markdown sweep
// PURITY: CORE
// INVARIANT: All option objects are immutable

import type { ExclusionPattern, LintMode } from "../models.js";

/**
 * Внешний линтер: исполняемый файл и аргументы перед флагами правил.
 *
 * @property command Executable name or path (resolved through PATH)
 * @property args Arguments placed before `--disable-rules`
 */
export interface LinterCommand {
	readonly command: string;
	readonly args: ReadonlyArray<string>;
}

/**
 * Конфигурация из файла mdsweep.config.json.
 *
 * Every field is optional in the file; the loader fills gaps from
 * {@link DEFAULT_CONFIG}.
 */
export interface SweepConfig {
	readonly linter: LinterCommand;
	readonly disabledRules: ReadonlyArray<string>;
	readonly crashMarkers: ReadonlyArray<string>;
	readonly exclude: ReadonlyArray<ExclusionPattern>;
	readonly timeoutMs: number | null;
}

/**
 * Опции командной строки.
 *
 * @property targetPath Root directory to sweep
 * @property mode scan (report only) or fix (rewrite in place)
 * @property gitignorePath Explicit .gitignore; defaults to `<root>/.gitignore`
 * @property configPath Explicit config file; defaults to `<root>/mdsweep.config.json`
 * @property disabledRules Replaces the configured rule list when present
 * @property linter Replaces the configured linter command when present
 * @property timeoutMs Replaces the configured timeout when present
 * @property listOnly Print the filtered file list and stop
 * @property noPreflight Skip the linter availability check
 */
export interface CLIOptions {
	readonly targetPath: string;
	readonly mode: LintMode;
	readonly gitignorePath?: string;
	readonly configPath?: string;
	readonly disabledRules?: ReadonlyArray<string>;
	readonly linter?: string;
	readonly timeoutMs?: number;
	readonly listOnly: boolean;
	readonly noPreflight: boolean;
}

/**
 * Fully resolved settings for one run.
 *
 * @invariant root and gitignorePath are absolute
 */
export interface SweepSettings {
	readonly root: string;
	readonly mode: LintMode;
	readonly gitignorePath: string;
	readonly linter: LinterCommand;
	readonly disabledRules: ReadonlyArray<string>;
	readonly crashMarkers: ReadonlyArray<string>;
	readonly exclude: ReadonlyArray<ExclusionPattern>;
	readonly timeoutMs: number | null;
	readonly listOnly: boolean;
	readonly noPreflight: boolean;
}

export const CONFIG_FILE_NAME = "mdsweep.config.json";

export const DEFAULT_CONFIG: SweepConfig = {
	linter: { command: "pymarkdown", args: [] },
	disabledRules: ["md013", "md033", "md041"],
	crashMarkers: [
		"BadTokenizationError",
		"Traceback (most recent call last)",
		"Exception",
	],
	exclude: [],
	timeoutMs: null,
};
