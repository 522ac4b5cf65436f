// CHANGE: Pure decision function mapping a finished sweep to an exit code
// FORMAT THEOREM: ∀s ∈ RunSummary: |s.failed| > 0 ↔ computeExitCode(toDecisionState(s)) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import {
	type DecisionState,
	EXIT_FAILURE,
	EXIT_OK,
	type ExitCode,
	type RunSummary,
} from "./models.js";

/**
 * Computes process exit code from decision state (pure function).
 *
 * @returns 1 if any genuine lint failure was recorded; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition state.hasLintFailures → result = 1
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ hasLintFailures: true });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	state.hasLintFailures ? EXIT_FAILURE : EXIT_OK;

/**
 * Projects a run summary onto the decision state.
 * Files skipped because of tool errors are deliberately absent.
 *
 * @pure true
 * @complexity O(1)
 */
export const toDecisionState = (summary: RunSummary): DecisionState => ({
	hasLintFailures: summary.failed.length > 0,
});

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	summary: RunSummary,
): Effect.Effect<ExitCode> =>
	pipe(summary, toDecisionState, computeExitCode, Effect.succeed);
