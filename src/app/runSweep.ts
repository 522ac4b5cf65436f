// CHANGE: Application layer orchestration for the markdown sweep
// PURITY: APP (no process.exit; composes SHELL effects with CORE decisions)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every discovered, non-excluded file is linted exactly once, in order
// INVARIANT: ExitCode = 1 iff a genuine lint failure or a fatal error occurred
// COMPLEXITY: O(n) linter invocations where n = |files|

import { Effect, type Layer } from "effect";
import { match } from "ts-pattern";

import { computeExitCodeEffect } from "../core/decision.js";
import type { AppError, ExternalToolError, FSError } from "../core/errors.js";
import { buildExclusionPatterns } from "../core/ignore/gitignore.js";
import { buildLintArgs, classifyLintResult } from "../core/lint/classify.js";
import { EMPTY_SUMMARY, recordOutcome } from "../core/lint/summary.js";
import {
	EXIT_FAILURE,
	EXIT_OK,
	type ExitCode,
	type RunSummary,
} from "../core/models.js";
import { resolveConfigPath, resolveSettings } from "../core/settings.js";
import type { CLIOptions, SweepSettings } from "../core/types/index.js";
import {
	printPreflightReport,
	runPreflight,
} from "../shell/analysis/preflight.js";
import { loadSweepConfig } from "../shell/config/index.js";
import { discoverMarkdownFiles } from "../shell/files/discover.js";
import { readGitignorePatterns } from "../shell/ignore/gitignore-reader.js";
import { LintRunner, lintRunnerLive } from "../shell/lint/lint-runner.js";
import {
	FILE_PLACEHOLDER,
	printFatal,
	printFileCount,
	printFileList,
	printOutcome,
	printSummary,
	printSweepHeader,
} from "../shell/output/printer.js";

/**
 * Builds the LintRunner layer for a resolved run.
 */
export type LintRunnerLayerFactory = (
	settings: SweepSettings,
) => Layer.Layer<LintRunner>;

export const defaultLintRunnerLayer: LintRunnerLayerFactory = (settings) =>
	lintRunnerLive({
		linter: settings.linter,
		cwd: settings.root,
		timeoutMs: settings.timeoutMs,
	});

/**
 * Discovers the files to lint: .gitignore patterns, the tooling exclusion and
 * configured extras applied to every *.md below the root.
 *
 * @effect Effect<string[], FSError>
 */
export function collectFiles(
	settings: SweepSettings,
): Effect.Effect<string[], FSError> {
	return Effect.gen(function* () {
		const gitignorePatterns = yield* readGitignorePatterns(
			settings.gitignorePath,
		);
		const patterns = buildExclusionPatterns(
			gitignorePatterns,
			settings.exclude,
		);
		return yield* discoverMarkdownFiles(settings.root, patterns);
	});
}

/**
 * Lints `files` one after another and accumulates the outcomes.
 * A failing file never stops the iteration.
 *
 * @effect Effect<RunSummary, ExternalToolError, LintRunner>
 */
export function lintFiles(
	files: readonly string[],
	settings: SweepSettings,
): Effect.Effect<RunSummary, ExternalToolError, LintRunner> {
	return Effect.flatMap(LintRunner, (runner) =>
		Effect.reduce(files, EMPTY_SUMMARY, (summary, file) =>
			runner.run(file, settings.disabledRules, settings.mode).pipe(
				Effect.map((result) =>
					classifyLintResult(
						file,
						settings.mode,
						result,
						settings.crashMarkers,
					),
				),
				Effect.tap((outcome) => Effect.sync(() => printOutcome(outcome))),
				Effect.map((outcome) => recordOutcome(summary, outcome)),
			),
		),
	);
}

/**
 * Runs one sweep with resolved settings.
 *
 * @effect Effect<ExitCode, AppError, LintRunner>
 */
export function sweep(
	settings: SweepSettings,
): Effect.Effect<ExitCode, AppError, LintRunner> {
	return Effect.gen(function* () {
		const files = yield* collectFiles(settings);

		if (settings.listOnly) {
			printFileList(files);
			return EXIT_OK;
		}

		if (!settings.noPreflight) {
			const version = yield* runPreflight(settings.linter.command);
			console.log(`🧰 Linter: ${settings.linter.command} ${version}`);
		}

		printSweepHeader(
			settings,
			buildLintArgs(
				settings.linter.args,
				settings.disabledRules,
				settings.mode,
				FILE_PLACEHOLDER,
			),
		);
		printFileCount(files.length);

		if (files.length === 0) {
			console.log("No markdown files found.");
			return EXIT_OK;
		}

		const summary = yield* lintFiles(files, settings);
		printSummary(summary);
		return yield* computeExitCodeEffect(summary);
	});
}

function reportFailure(error: AppError): void {
	match(error)
		.with({ _tag: "PreflightFailed" }, (failure) => {
			printPreflightReport(failure);
		})
		.with({ _tag: "ConfigError" }, ({ path, detail }) => {
			printFatal(`Invalid config ${path}: ${detail}`);
		})
		.with({ _tag: "FS" }, ({ path, detail }) => {
			printFatal(path === undefined ? detail : `${detail} (${path})`);
		})
		.with({ _tag: "ExternalToolError" }, ({ reason }) => {
			printFatal(reason);
		})
		.exhaustive();
}

/**
 * Orchestrates a sweep and returns ExitCode as value (no process.exit).
 *
 * @param cliOptions Parsed CLI options
 * @param makeLayer LintRunner layer factory; tests pass a fake
 * @param cwd Directory relative paths are resolved against
 *
 * @effect Effect<ExitCode, never> - errors are reported and mapped to 1
 * @invariant ExitCode ∈ {0,1}
 */
export function runSweep(
	cliOptions: CLIOptions,
	makeLayer: LintRunnerLayerFactory = defaultLintRunnerLayer,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const config = yield* loadSweepConfig(resolveConfigPath(cliOptions, cwd));
		const settings = resolveSettings(cliOptions, config, cwd);
		return yield* sweep(settings).pipe(Effect.provide(makeLayer(settings)));
	}).pipe(
		Effect.catchAll((error) =>
			Effect.sync((): ExitCode => {
				reportFailure(error);
				return EXIT_FAILURE;
			}),
		),
	);
}
