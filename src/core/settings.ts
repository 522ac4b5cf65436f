// CHANGE: Merge CLI options over config file values
// FORMAT THEOREM: ∀k: settings[k] = cli[k] ?? config[k]
// PURITY: CORE
// COMPLEXITY: O(1)

import { resolve } from "node:path";

import {
	type CLIOptions,
	CONFIG_FILE_NAME,
	type SweepConfig,
	type SweepSettings,
} from "./types/index.js";

/**
 * Produces the settings for one run. CLI values win over config values.
 *
 * @param cwd Directory relative CLI paths are resolved against
 * @pure true (given cwd)
 */
export function resolveSettings(
	cli: CLIOptions,
	config: SweepConfig,
	cwd: string,
): SweepSettings {
	const root = resolve(cwd, cli.targetPath);
	return {
		root,
		mode: cli.mode,
		gitignorePath:
			cli.gitignorePath === undefined
				? resolve(root, ".gitignore")
				: resolve(cwd, cli.gitignorePath),
		linter:
			cli.linter === undefined
				? config.linter
				: { ...config.linter, command: cli.linter },
		disabledRules: cli.disabledRules ?? config.disabledRules,
		crashMarkers: config.crashMarkers,
		exclude: config.exclude,
		timeoutMs: cli.timeoutMs ?? config.timeoutMs,
		listOnly: cli.listOnly,
		noPreflight: cli.noPreflight,
	};
}

/**
 * Config file location: explicit `--config` relative to cwd, otherwise
 * `mdsweep.config.json` in the sweep root.
 *
 * @pure true (given cwd)
 */
export function resolveConfigPath(cli: CLIOptions, cwd: string): string {
	return cli.configPath === undefined
		? resolve(cwd, cli.targetPath, CONFIG_FILE_NAME)
		: resolve(cwd, cli.configPath);
}
