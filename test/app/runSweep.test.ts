// CHANGE: End-to-end orchestration specs against an in-process LintRunner
// INVARIANT: Every discovered file is attempted once, in order; skips never fail the run

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { runSweep } from "../../src/app/runSweep.js";
import { lintRunnerLive } from "../../src/shell/lint/lint-runner.js";
import type { ExitCode } from "../../src/core/models.js";
import type { CLIOptions } from "../../src/core/types/index.js";
import {
	createFakeLintRunner,
	type FakeLintRunner,
	lintFailure,
} from "../utils/fakeLintRunner.js";
import { createTempTree, type TempTree } from "../utils/tempTree.js";

const DEFAULT_RULES = ["md013", "md033", "md041"];

const scanCli: CLIOptions = {
	targetPath: ".",
	mode: "scan",
	listOnly: false,
	noPreflight: false,
};

let tree: TempTree;
let out: () => unknown[];
let err: () => unknown[];

function sweepWith(fake: FakeLintRunner, cli: Partial<CLIOptions> = {}): ExitCode {
	return Effect.runSync(
		runSweep({ ...scanCli, ...cli }, () => fake.layer, tree.root),
	);
}

function useTree(files: Readonly<Record<string, string>>): void {
	tree.cleanup();
	tree = createTempTree(files);
}

beforeEach(() => {
	tree = createTempTree({
		".gitignore": "node_modules/\n",
		"README.md": "# Title\n",
		"docs/a.md": "# A\n",
		"docs/b.md": "# B\n",
		"node_modules/pkg/readme.md": "# dep\n",
		".claude/notes.md": "# notes\n",
	});
	const log = vi.spyOn(console, "log").mockImplementation(() => {});
	const error = vi.spyOn(console, "error").mockImplementation(() => {});
	out = () => log.mock.calls.map((call) => call[0]);
	err = () => error.mock.calls.map((call) => call[0]);
});

afterEach(() => {
	tree.cleanup();
});

describe("runSweep: linting", () => {
	it("attempts every file in order and passes when all succeed", () => {
		const fake = createFakeLintRunner();
		expect(sweepWith(fake)).toBe(0);
		expect(fake.calls).toEqual([
			{ file: "README.md", disabledRules: DEFAULT_RULES, mode: "scan" },
			{ file: "docs/a.md", disabledRules: DEFAULT_RULES, mode: "scan" },
			{ file: "docs/b.md", disabledRules: DEFAULT_RULES, mode: "scan" },
		]);
		expect(out()).toContain("📄 Files to lint: 3");
		expect(out()).toContain("\n✅ All 3 markdown files passed (3 attempted)");
	});

	it("keeps going after a failure and exits 1", () => {
		const fake = createFakeLintRunner({
			results: { "docs/a.md": lintFailure("docs/a.md:1:1: MD022") },
		});
		expect(sweepWith(fake)).toBe(1);
		expect(fake.calls.map((call) => call.file)).toEqual([
			"README.md",
			"docs/a.md",
			"docs/b.md",
		]);
		expect(err()).toEqual(["\n❌ Lint failures (1):", "  • docs/a.md"]);
	});

	it("treats a crash marker in fix mode as a skip", () => {
		const fake = createFakeLintRunner({
			results: {
				"docs/b.md": lintFailure("BadTokenizationError: unexpected token"),
			},
		});
		expect(sweepWith(fake, { mode: "fix" })).toBe(0);
		expect(out()).toContain(
			"⚠️  docs/b.md skipped: linter crashed (BadTokenizationError)",
		);
		expect(out()).toContain("  • docs/b.md (linter crashed (BadTokenizationError))");
		expect(fake.calls.every((call) => call.mode === "fix")).toBeTruthy();
	});

	it("counts the same output as a failure in scan mode", () => {
		const fake = createFakeLintRunner({
			results: {
				"docs/b.md": lintFailure("BadTokenizationError: unexpected token"),
			},
		});
		expect(sweepWith(fake)).toBe(1);
	});

	it("passes CLI rules over config rules", () => {
		useTree({
			"README.md": "",
			"mdsweep.config.json": JSON.stringify({ disabledRules: ["md001"] }),
		});
		const fromConfig = createFakeLintRunner();
		sweepWith(fromConfig);
		expect(fromConfig.calls).toEqual([
			{ file: "README.md", disabledRules: ["md001"], mode: "scan" },
		]);

		const fromCli = createFakeLintRunner();
		sweepWith(fromCli, { disabledRules: [] });
		expect(fromCli.calls).toEqual([
			{ file: "README.md", disabledRules: [], mode: "scan" },
		]);
	});

	it("exits 0 without linting when no markdown exists", () => {
		useTree({ "src/index.ts": "" });
		const fake = createFakeLintRunner();
		expect(sweepWith(fake)).toBe(0);
		expect(fake.calls).toEqual([]);
		expect(out()).toContain("No markdown files found.");
	});
});

describe("runSweep: list and preflight", () => {
	it("--list prints files without running the linter", () => {
		const fake = createFakeLintRunner();
		expect(sweepWith(fake, { listOnly: true })).toBe(0);
		expect(out()).toEqual(["README.md", "docs/a.md", "docs/b.md"]);
		expect(fake.calls).toEqual([]);
		expect(fake.versionChecks()).toBe(0);
	});

	it("checks the linter version once before linting", () => {
		const fake = createFakeLintRunner({ version: "0.9.26" });
		sweepWith(fake);
		expect(fake.versionChecks()).toBe(1);
		expect(out()[0]).toBe("🧰 Linter: pymarkdown 0.9.26");
	});

	it("exits 1 without linting when preflight fails", () => {
		const fake = createFakeLintRunner({ version: null });
		expect(sweepWith(fake)).toBe(1);
		expect(fake.calls).toEqual([]);
		expect(err()).toContain("  • Command: pymarkdown");
	});

	it("--no-preflight skips the version check", () => {
		const fake = createFakeLintRunner({ version: null });
		expect(sweepWith(fake, { noPreflight: true })).toBe(0);
		expect(fake.versionChecks()).toBe(0);
		expect(fake.calls).toHaveLength(3);
	});
});

describe("runSweep: fatal errors", () => {
	it("stops and exits 1 when the linter cannot be spawned", () => {
		const fake = createFakeLintRunner({ spawnFailures: ["docs/a.md"] });
		expect(sweepWith(fake)).toBe(1);
		expect(fake.calls.map((call) => call.file)).toEqual([
			"README.md",
			"docs/a.md",
		]);
		expect(err()).toEqual([
			"❌ Failed to run fake-linter: ENOENT: spawn fake-linter ENOENT",
		]);
	});

	it("exits 1 on an invalid config file", () => {
		useTree({ "README.md": "", "mdsweep.config.json": "{" });
		const fake = createFakeLintRunner();
		expect(sweepWith(fake)).toBe(1);
		expect(fake.calls).toEqual([]);
		expect(fake.versionChecks()).toBe(0);
		expect(String(err()[0]).startsWith("❌ Invalid config ")).toBeTruthy();
	});

	it("exits 1 when the target directory does not exist", () => {
		const fake = createFakeLintRunner();
		expect(sweepWith(fake, { targetPath: "absent" })).toBe(1);
		expect(fake.calls).toEqual([]);
		expect(
			String(err()[0]).startsWith("❌ Failed to walk directory: "),
		).toBeTruthy();
	});
});

describe("runSweep: live runner", () => {
	it("skips a file whose output overflows and lints the rest", () => {
		useTree({
			"a.md": "",
			"b.md": "",
			"c.md": "",
			"mdsweep.config.json": JSON.stringify({
				linter: {
					command: "sh",
					args: ["-c", 'if [ "$1" = a.md ]; then yes x | head -c 4096; exit 1; fi'],
				},
				disabledRules: [],
			}),
		});
		return Effect.runPromise(
			runSweep(
				{ ...scanCli, noPreflight: true },
				(settings) =>
					lintRunnerLive({
						linter: settings.linter,
						cwd: settings.root,
						timeoutMs: settings.timeoutMs,
						maxOutputBytes: 1024,
					}),
				tree.root,
			),
		).then((code) => {
			expect(code).toBe(0);
			expect(out()).toContain("⚠️  a.md skipped: output exceeded 1024 bytes");
			expect(out()).toContain("✅ b.md");
			expect(out()).toContain("✅ c.md");
		});
	});
});
