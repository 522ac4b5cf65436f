// CHANGE: Pure accumulator over per-file lint outcomes
// PURITY: CORE
// INVARIANT: attempted = |passed| + |failed| + |skipped|; insertion order preserved
// COMPLEXITY: O(1) amortized per outcome (copying aside)

import { match } from "ts-pattern";

import type { LintOutcome, RunSummary } from "../models.js";

export const EMPTY_SUMMARY: RunSummary = {
	attempted: 0,
	passed: [],
	failed: [],
	skipped: [],
};

/**
 * Returns a new summary with `outcome` appended to the matching bucket.
 *
 * @pure true
 */
export function recordOutcome(
	summary: RunSummary,
	outcome: LintOutcome,
): RunSummary {
	const attempted = summary.attempted + 1;
	return match(outcome)
		.returnType<RunSummary>()
		.with({ _tag: "Passed" }, ({ file }) => ({
			...summary,
			attempted,
			passed: [...summary.passed, file],
		}))
		.with({ _tag: "Failed" }, ({ file }) => ({
			...summary,
			attempted,
			failed: [...summary.failed, file],
		}))
		.with({ _tag: "ToolError" }, ({ file, reason }) => ({
			...summary,
			attempted,
			skipped: [...summary.skipped, { file, reason }],
		}))
		.exhaustive();
}

/**
 * Folds a list of outcomes into a summary.
 *
 * @pure true
 */
export const summarize = (outcomes: readonly LintOutcome[]): RunSummary =>
	outcomes.reduce(recordOutcome, EMPTY_SUMMARY);
