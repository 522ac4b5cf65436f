// CHANGE: Functional Core domain models for the markdown sweep
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the sweep process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

export const EXIT_OK: ExitCode = 0;
export const EXIT_FAILURE: ExitCode = 1;

/**
 * Minimal decision state for producing an exit code from a finished run.
 *
 * @remarks
 * - @pure true
 * - @invariant skipped files never contribute to this state
 */
export interface DecisionState {
	readonly hasLintFailures: boolean;
}

/**
 * Mode keyword passed to the external linter.
 * `scan` only reports violations, `fix` rewrites the file in place.
 */
export type LintMode = "scan" | "fix";

/**
 * Wildcard pattern tested against a root-relative path (`/docs/a.md`).
 * `*` matches any run of characters including `/`, `?` matches one character.
 */
export type ExclusionPattern = string;

/**
 * Raw result of one linter invocation.
 *
 * @property exitCode Process exit code (non-negative; signals map to 1)
 * @property output stdout followed by stderr
 * @property timedOut True when the process was killed by the configured timeout
 * @property outputLimit Set to the byte limit when the output overflowed it
 */
export interface LintRunResult {
	readonly exitCode: number;
	readonly output: string;
	readonly timedOut: boolean;
	readonly outputLimit?: number;
}

/**
 * Classified outcome of linting a single file.
 *
 * @invariant `_tag` discriminates the three outcomes
 */
export type LintOutcome =
	| { readonly _tag: "Passed"; readonly file: string }
	| {
			readonly _tag: "Failed";
			readonly file: string;
			readonly exitCode: number;
			readonly output: string;
	  }
	| {
			readonly _tag: "ToolError";
			readonly file: string;
			readonly exitCode: number;
			readonly reason: string;
	  };

/**
 * A file skipped because the linter itself broke on it.
 */
export interface SkippedFile {
	readonly file: string;
	readonly reason: string;
}

/**
 * Accumulated result of a sweep.
 *
 * @invariant attempted = |passed| + |failed| + |skipped|
 */
export interface RunSummary {
	readonly attempted: number;
	readonly passed: readonly string[];
	readonly failed: readonly string[];
	readonly skipped: readonly SkippedFile[];
}
