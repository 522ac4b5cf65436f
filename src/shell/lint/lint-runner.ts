// CHANGE: LintRunner capability as an Effect service with a child_process layer
// PURITY: SHELL (spawns the external linter)
// EFFECT: Effect<LintRunResult, ExternalToolError, LintRunner>
// INVARIANT: One process per call; the call completes only after the process exits
// COMPLEXITY: O(1) per call (the linter dominates)

import { execFile } from "node:child_process";

import { Context, Effect, Layer } from "effect";

import { ExternalToolError } from "../../core/errors.js";
import { buildLintArgs } from "../../core/lint/classify.js";
import type { LintMode, LintRunResult } from "../../core/models.js";
import {
	type ExecCompletionError,
	isOutputOverflow,
	isSpawnFailure,
	type LinterCommand,
	toLintRunResult,
} from "../../core/types/index.js";

export const DEFAULT_MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Operations the sweep needs from the external linter.
 */
export interface LintRunnerShape {
	readonly run: (
		file: string,
		disabledRules: readonly string[],
		mode: LintMode,
	) => Effect.Effect<LintRunResult, ExternalToolError>;
	readonly version: () => Effect.Effect<string, ExternalToolError>;
}

export class LintRunner extends Context.Tag("LintRunner")<
	LintRunner,
	LintRunnerShape
>() {}

/**
 * Process options for the live runner.
 *
 * @property cwd Working directory of every spawned process
 * @property timeoutMs Kill the process after this many ms; null disables
 * @property maxOutputBytes Per-stream output limit; defaults to 16 MiB
 */
export interface LintRunnerOptions {
	readonly linter: LinterCommand;
	readonly cwd: string;
	readonly timeoutMs: number | null;
	readonly maxOutputBytes?: number;
}

export interface ExecOptions {
	readonly cwd: string;
	readonly timeoutMs: number | null;
	readonly maxOutputBytes: number;
}

function describeError(error: Error): string {
	return "code" in error && typeof error.code === "string"
		? `${error.code}: ${error.message}`
		: error.message;
}

/**
 * Spawns `command args` and resolves with its completion, whatever the exit
 * code. Only a failure to spawn becomes ExternalToolError; an output overflow
 * is a completed run carrying `outputLimit`.
 *
 * @effect Effect<LintRunResult, ExternalToolError>
 */
export function execLinter(
	command: string,
	args: readonly string[],
	options: ExecOptions,
): Effect.Effect<LintRunResult, ExternalToolError> {
	return Effect.async<LintRunResult, ExternalToolError>((resume) => {
		const child = execFile(
			command,
			[...args],
			{
				cwd: options.cwd,
				encoding: "utf8",
				maxBuffer: options.maxOutputBytes,
				timeout: options.timeoutMs ?? 0,
				windowsHide: true,
			},
			(error: (Error & ExecCompletionError) | null, stdout, stderr) => {
				if (error !== null && isSpawnFailure(error)) {
					resume(
						Effect.fail(
							new ExternalToolError({
								tool: "linter",
								reason: `Failed to run ${command}: ${describeError(error)}`,
							}),
						),
					);
					return;
				}
				const timedOut =
					error !== null &&
					!isOutputOverflow(error) &&
					options.timeoutMs !== null &&
					options.timeoutMs > 0 &&
					error.killed === true;
				resume(
					Effect.succeed(
						toLintRunResult(
							error,
							stdout,
							stderr,
							timedOut,
							options.maxOutputBytes,
						),
					),
				);
			},
		);
		return Effect.sync(() => {
			child.kill();
		});
	});
}

/**
 * Live LintRunner backed by child_process.execFile (no shell).
 *
 * @example
 * ```ts
 * const program = Effect.flatMap(LintRunner, (runner) =>
 *   runner.run("README.md", ["md013"], "scan"),
 * );
 * Effect.runPromise(Effect.provide(program, lintRunnerLive(options)));
 * ```
 */
export function lintRunnerLive(
	options: LintRunnerOptions,
): Layer.Layer<LintRunner> {
	const { linter } = options;
	const execOptions: ExecOptions = {
		cwd: options.cwd,
		timeoutMs: options.timeoutMs,
		maxOutputBytes: options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES,
	};
	return Layer.succeed(LintRunner, {
		run: (file, disabledRules, mode) =>
			execLinter(
				linter.command,
				buildLintArgs(linter.args, disabledRules, mode, file),
				execOptions,
			),
		version: () =>
			execLinter(
				linter.command,
				[...linter.args, "--version"],
				execOptions,
			).pipe(
				Effect.flatMap((result) =>
					result.exitCode === 0
						? Effect.succeed(result.output.trim())
						: Effect.fail(
								new ExternalToolError({
									tool: "linter",
									reason: `${linter.command} --version exited with ${result.exitCode}`,
								}),
							),
				),
			),
	});
}
