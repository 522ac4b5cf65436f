// CHANGE: main.ts is a thin APP delegator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import type { Effect } from "effect";

import { runSweep } from "./app/runSweep.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv Arguments after the executable and script name
 * @returns Effect yielding ExitCode (0 | 1)
 */
export function main(
	argv: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode> {
	return runSweep(parseCLIArgs(argv));
}
