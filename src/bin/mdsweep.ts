#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// FORMAT THEOREM: ∀run: returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect } from "effect";

import { EXIT_FAILURE, type ExitCode } from "../core/models.js";
import { main } from "../main.js";

const program = main().pipe(
	// Shell boundary: defects (bugs, not typed failures) still end in exit 1
	Effect.catchAllDefect((defect) =>
		Effect.sync((): ExitCode => {
			console.error("Fatal error:", defect);
			return EXIT_FAILURE;
		}),
	),
	Effect.flatMap((code) => Effect.sync(() => process.exit(code))),
);

Effect.runFork(program);
