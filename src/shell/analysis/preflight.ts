// CHANGE: Preflight check that the external markdown linter can be executed
// PURITY: SHELL (spawns `<linter> --version`, console output)
// EFFECT: Effect<string, PreflightFailed, LintRunner>
// INVARIANT: Succeeds with the reported version, or fails before any file is linted
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { PreflightFailed } from "../../core/errors.js";
import { LintRunner } from "../lint/lint-runner.js";

/**
 * Known install hints keyed by executable name.
 */
const INSTALL_HINTS: ReadonlyMap<string, string> = new Map([
	["pymarkdown", "pip install pymarkdownlnt"],
]);

/**
 * Returns the install command to suggest for `command`, if one is known.
 *
 * @pure true
 */
export function installHintFor(command: string): string | null {
	const base = command.split(/[\\/]/).pop() ?? command;
	return INSTALL_HINTS.get(base.replace(/\.(exe|cmd)$/i, "")) ?? null;
}

/**
 * Verifies the linter answers `--version`.
 *
 * @effect Effect<string, PreflightFailed, LintRunner>
 */
export function runPreflight(
	command: string,
): Effect.Effect<string, PreflightFailed, LintRunner> {
	return Effect.flatMap(LintRunner, (runner) => runner.version()).pipe(
		Effect.mapError(
			(error) => new PreflightFailed({ command, detail: error.reason }),
		),
	);
}

/**
 * Prints guidance for a failed preflight.
 *
 * @pure false (console output)
 */
export function printPreflightReport(failure: PreflightFailed): void {
	console.error("\n❌ Preflight failed: markdown linter is not available.\n");
	console.error(`  • Command: ${failure.command}`);
	console.error(`    Detail: ${failure.detail}`);
	const hint = installHintFor(failure.command);
	if (hint !== null) {
		console.error("    Install:");
		console.error(`      ${hint}`);
	}
	console.error(
		"    Or point mdsweep at another executable with --linter <cmd>, or skip this check with --no-preflight.\n",
	);
}
