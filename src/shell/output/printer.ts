// CHANGE: Console output for sweep progress and the final report
// PURITY: SHELL (console output)
// INVARIANT: Each file produces exactly one progress line; report lists every failure and skip
// COMPLEXITY: O(n) where n = |files|

import { match } from "ts-pattern";

import type { LintOutcome, RunSummary } from "../../core/models.js";
import type { SweepSettings } from "../../core/types/index.js";

export const FILE_PLACEHOLDER = "<file>";

function quoteArg(arg: string): string {
	return /^[\w./:@,=+-]+$/.test(arg) ? arg : `"${arg.replace(/"/g, '\\"')}"`;
}

/**
 * Renders the command line used for every file, with a placeholder in the
 * file position, so a run can be reproduced by hand.
 *
 * @pure true
 */
export function formatCommandTemplate(
	command: string,
	args: readonly string[],
): string {
	return [command, ...args]
		.map((part) => (part === FILE_PLACEHOLDER ? part : quoteArg(part)))
		.join(" ");
}

/**
 * Indents tool output under its file line.
 *
 * @pure true
 */
export function indentOutput(output: string, prefix = "     "): string {
	return output
		.trimEnd()
		.split(/\r?\n/)
		.map((line) => `${prefix}${line}`)
		.join("\n");
}

export function printSweepHeader(
	settings: SweepSettings,
	commandArgs: readonly string[],
): void {
	console.log(
		`🔍 Sweeping markdown under: ${settings.root} (mode: ${settings.mode})`,
	);
	console.log(
		`   ↳ Command: ${formatCommandTemplate(settings.linter.command, commandArgs)}`,
	);
}

export function printFileCount(count: number): void {
	console.log(`📄 Files to lint: ${count}`);
}

/**
 * Prints the filtered list for `--list`.
 */
export function printFileList(files: readonly string[]): void {
	for (const file of files) {
		console.log(file);
	}
}

/**
 * Prints the one-line progress entry for a classified file.
 */
export function printOutcome(outcome: LintOutcome): void {
	match(outcome)
		.with({ _tag: "Passed" }, ({ file }) => {
			console.log(`✅ ${file}`);
		})
		.with({ _tag: "Failed" }, ({ file, exitCode, output }) => {
			console.log(`❌ ${file} (exit ${exitCode})`);
			if (output.trim().length > 0) {
				console.log(indentOutput(output));
			}
		})
		.with({ _tag: "ToolError" }, ({ file, reason }) => {
			console.log(`⚠️  ${file} skipped: ${reason}`);
		})
		.exhaustive();
}

/**
 * Prints the end-of-run report.
 *
 * @invariant failures are listed on stderr, skips on stdout
 */
export function printSummary(summary: RunSummary): void {
	if (summary.skipped.length > 0) {
		console.log(
			`\n⚠️  Skipped due to tool errors (${summary.skipped.length}):`,
		);
		for (const { file, reason } of summary.skipped) {
			console.log(`  • ${file} (${reason})`);
		}
	}

	if (summary.failed.length > 0) {
		console.error(`\n❌ Lint failures (${summary.failed.length}):`);
		for (const file of summary.failed) {
			console.error(`  • ${file}`);
		}
		return;
	}

	console.log(
		`\n✅ All ${summary.passed.length} markdown files passed (${summary.attempted} attempted)`,
	);
}

/**
 * Reports a fatal error at the orchestration boundary.
 */
export function printFatal(message: string): void {
	console.error(`❌ ${message}`);
}
