// CHANGE: Convert an execFile completion into a LintRunResult
// PURITY: CORE
// INVARIANT: error === null → exitCode = 0; killed by signal → exitCode = 1
// INVARIANT: maxBuffer overflow is a completed run, never a spawn failure
// COMPLEXITY: O(|stdout| + |stderr|)

import type { LintRunResult } from "../models.js";

/**
 * The parts of a child_process completion error this module reads.
 */
export interface ExecCompletionError {
	readonly code?: number | string | null;
	readonly killed?: boolean;
	readonly signal?: string | null;
}

/**
 * Code Node sets when a child printed more than `maxBuffer` bytes.
 * The child ran and was killed; it was not a failure to start.
 */
export const OUTPUT_OVERFLOW_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/**
 * @pure true
 */
export function isOutputOverflow(error: ExecCompletionError): boolean {
	return error.code === OUTPUT_OVERFLOW_CODE;
}

/**
 * Spawn-level failure codes (ENOENT, EACCES, ...) reported by Node as string
 * `code` values. These mean the process never ran, as opposed to a non-zero
 * exit or an output overflow.
 *
 * @pure true
 */
export function isSpawnFailure(error: ExecCompletionError): boolean {
	return typeof error.code === "string" && !isOutputOverflow(error);
}

/**
 * Joins stdout and stderr the way a terminal would show them.
 *
 * @pure true
 */
export function combineOutput(stdout: string, stderr: string): string {
	if (stdout.length === 0) return stderr;
	if (stderr.length === 0) return stdout;
	return stdout.endsWith("\n") ? `${stdout}${stderr}` : `${stdout}\n${stderr}`;
}

/**
 * Builds the run result from an execFile callback.
 *
 * @param timedOut Whether the configured timeout fired
 * @param maxOutputBytes The maxBuffer the process ran with
 * @pure true
 * @precondition error === null ∨ ¬isSpawnFailure(error)
 */
export function toLintRunResult(
	error: ExecCompletionError | null,
	stdout: string,
	stderr: string,
	timedOut: boolean,
	maxOutputBytes: number,
): LintRunResult {
	const output = combineOutput(stdout, stderr);
	if (error === null) {
		return { exitCode: 0, output, timedOut: false };
	}
	if (isOutputOverflow(error)) {
		return { exitCode: 1, output, timedOut: false, outputLimit: maxOutputBytes };
	}
	const exitCode =
		typeof error.code === "number" && error.code !== 0 ? error.code : 1;
	return { exitCode, output, timedOut };
}
