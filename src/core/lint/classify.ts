// CHANGE: Classify one linter invocation as passed, failed or tool error
// FORMAT THEOREM: exitCode = 0 → Passed; timedOut ∨ outputLimit set → ToolError;
//                 mode = fix ∧ ∃m ∈ markers: m ⊂ output → ToolError; otherwise Failed
// PURITY: CORE
// INVARIANT: scan mode never consults crash markers
// COMPLEXITY: O(|markers| · |output|)

import { match, P } from "ts-pattern";

import type { LintMode, LintOutcome, LintRunResult } from "../models.js";

/**
 * Builds the argument vector for the external linter.
 * The `--disable-rules` pair is omitted when there is nothing to disable.
 *
 * @pure true
 *
 * @example
 * ```ts
 * buildLintArgs([], ["md013", "md033"], "fix", "README.md");
 * // ["--disable-rules", "md013,md033", "fix", "README.md"]
 * ```
 */
export function buildLintArgs(
	baseArgs: readonly string[],
	disabledRules: readonly string[],
	mode: LintMode,
	file: string,
): string[] {
	const disable =
		disabledRules.length > 0
			? ["--disable-rules", disabledRules.join(",")]
			: [];
	return [...baseArgs, ...disable, mode, file];
}

/**
 * Returns the first marker found in `output`, or null.
 *
 * @pure true
 * @invariant result === null ∨ output.includes(result)
 */
export function findCrashMarker(
	output: string,
	markers: readonly string[],
): string | null {
	return (
		markers.find((marker) => marker.length > 0 && output.includes(marker)) ??
		null
	);
}

/**
 * Classifies the raw result of linting `file`.
 *
 * @pure true
 * @postcondition result.file === file
 */
export function classifyLintResult(
	file: string,
	mode: LintMode,
	result: LintRunResult,
	crashMarkers: readonly string[],
): LintOutcome {
	const marker =
		mode === "fix" ? findCrashMarker(result.output, crashMarkers) : null;

	return match({ result, marker })
		.returnType<LintOutcome>()
		.with({ result: { exitCode: 0 } }, () => ({ _tag: "Passed", file }))
		.with({ result: { timedOut: true } }, ({ result: r }) => ({
			_tag: "ToolError",
			file,
			exitCode: r.exitCode,
			reason: "timed out",
		}))
		.with(
			{ result: { outputLimit: P.select(P.number) } },
			(limit, { result: r }) => ({
				_tag: "ToolError",
				file,
				exitCode: r.exitCode,
				reason: `output exceeded ${limit} bytes`,
			}),
		)
		.with({ marker: P.string }, ({ result: r, marker: m }) => ({
			_tag: "ToolError",
			file,
			exitCode: r.exitCode,
			reason: `linter crashed (${m})`,
		}))
		.otherwise(({ result: r }) => ({
			_tag: "Failed",
			file,
			exitCode: r.exitCode,
			output: r.output,
		}));
}
