// CHANGE: CLI argument parsing for mdsweep
// PURITY: SHELL (reads process.argv)
// INVARIANT: Unknown flags (any token starting with "-") are ignored; the last positional wins as targetPath
// COMPLEXITY: O(n) where n = |argv|

import type { CLIOptions } from "../../core/types/index.js";

type ParseState = {
	-readonly [K in keyof CLIOptions]: CLIOptions[K];
};

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
}

// CHANGE: Handlers for flags that consume the following token
// INVARIANT: A missing value leaves state untouched and consumes nothing
type ValueFlagHandler = (value: string, current: ParseState) => ParseState;

function parseRuleList(value: string): string[] {
	return value
		.split(",")
		.map((rule) => rule.trim())
		.filter((rule) => rule.length > 0);
}

const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--gitignore": (value, current) => ({ ...current, gitignorePath: value }),
	"--config": (value, current) => ({ ...current, configPath: value }),
	"--linter": (value, current) => ({ ...current, linter: value }),
	"--disable": (value, current) => ({
		...current,
		disabledRules: parseRuleList(value),
	}),
	"--timeout": (value, current) => {
		const timeoutMs = Number.parseInt(value, 10);
		return Number.isNaN(timeoutMs) || timeoutMs < 0
			? current
			: { ...current, timeoutMs };
	},
};

const booleanHandlers: Readonly<
	Record<string, (current: ParseState) => ParseState>
> = {
	"--fix": (current) => ({ ...current, mode: "fix" }),
	"--scan": (current) => ({ ...current, mode: "scan" }),
	"--list": (current) => ({ ...current, listOnly: true }),
	"--no-preflight": (current) => ({ ...current, noPreflight: true }),
};

function processArgument(
	arg: string,
	next: string | undefined,
	current: ParseState,
): ArgProcessResult {
	if (!arg.startsWith("-")) {
		return { state: { ...current, targetPath: arg }, skipNext: false };
	}

	const valueHandler = valueHandlers[arg];
	if (valueHandler !== undefined) {
		if (next === undefined) return { state: current, skipNext: false };
		return { state: valueHandler(next, current), skipNext: true };
	}

	const booleanHandler = booleanHandlers[arg];
	if (booleanHandler !== undefined) {
		return { state: booleanHandler(current), skipNext: false };
	}

	return { state: current, skipNext: false };
}

/**
 * Парсит аргументы командной строки.
 *
 * @param args Arguments after the executable and script (defaults to process.argv)
 *
 * @example
 * ```ts
 * // Command: mdsweep docs --fix --disable md013,md041
 * const options = parseCLIArgs();
 * // { targetPath: "docs", mode: "fix", disabledRules: ["md013", "md041"], ... }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CLIOptions {
	let state: ParseState = {
		targetPath: ".",
		mode: "scan",
		listOnly: false,
		noPreflight: false,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return state;
}
