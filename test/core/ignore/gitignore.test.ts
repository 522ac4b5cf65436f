// CHANGE: Deterministic and property-based specs for .gitignore pattern derivation
// INVARIANT: comment/blank lines → null; "name/" → "*/name/*"; tooling exclusion always first

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	buildExclusionPatterns,
	directoryPattern,
	parseGitignore,
	parseGitignoreLine,
	TOOLING_EXCLUSION,
} from "../../../src/core/ignore/gitignore.js";

const nameChar = fc.constantFrom(
	..."abcdefghijklmnopqrstuvwxyz0123456789_-".split(""),
);
const dirName = fc
	.array(nameChar, { minLength: 1, maxLength: 12 })
	.map((chars) => chars.join(""));

describe("parseGitignoreLine: directory entries", () => {
	it("turns a trailing-slash entry into a directory pattern", () => {
		expect(parseGitignoreLine("node_modules/")).toBe("*/node_modules/*");
	});

	it("strips a leading slash from anchored entries", () => {
		expect(parseGitignoreLine("/dist/")).toBe("*/dist/*");
		expect(parseGitignoreLine("/coverage")).toBe("*/coverage/*");
	});

	it("keeps nested directory paths", () => {
		expect(parseGitignoreLine("docs/build/")).toBe("*/docs/build/*");
	});

	it("trims surrounding whitespace", () => {
		expect(parseGitignoreLine("  build/  ")).toBe("*/build/*");
	});

	it("treats a bare name without extension as a directory", () => {
		expect(parseGitignoreLine("vendor")).toBe("*/vendor/*");
	});

	it("treats dot-directories as extensionless", () => {
		expect(parseGitignoreLine(".venv")).toBe("*/.venv/*");
	});

	it("treats extensionless files such as LICENSE as directories too", () => {
		expect(parseGitignoreLine("LICENSE")).toBe("*/LICENSE/*");
	});

	it("keeps wildcards in trailing-slash entries", () => {
		expect(parseGitignoreLine("*.egg-info/")).toBe("*/*.egg-info/*");
	});
});

describe("parseGitignoreLine: ignored entries", () => {
	it.each([
		["", "blank"],
		["   ", "whitespace only"],
		["# comment", "comment"],
		["#build/", "commented-out directory"],
		["!keep/", "negation"],
		["*.log", "wildcard file pattern"],
		["debug?.txt", "single-char wildcard"],
		["[Bb]in", "character class"],
		["notes.txt", "file with extension"],
		[".env.local", "dotfile with extension"],
		["/", "root only"],
	])("returns null for %j (%s)", (line) => {
		expect(parseGitignoreLine(line)).toBeNull();
	});
});

describe("parseGitignore", () => {
	it("keeps file order and drops duplicates", () => {
		const content = [
			"# build output",
			"dist/",
			"",
			"*.log",
			"node_modules/",
			"dist",
		].join("\n");
		expect(parseGitignore(content)).toEqual([
			"*/dist/*",
			"*/node_modules/*",
		]);
	});

	it("handles CRLF line endings", () => {
		expect(parseGitignore("a/\r\nb/\r\n")).toEqual(["*/a/*", "*/b/*"]);
	});

	it("returns an empty list for empty content", () => {
		expect(parseGitignore("")).toEqual([]);
	});

	it("never yields a pattern for comment lines (property)", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				expect(parseGitignoreLine(`#${text}`)).toBeNull();
			}),
		);
	});

	it("never yields a pattern for whitespace-only lines (property)", () => {
		fc.assert(
			fc.property(
				fc.array(fc.constantFrom(" ", "\t"), { maxLength: 8 }),
				(chars) => {
					expect(parseGitignoreLine(chars.join(""))).toBeNull();
				},
			),
		);
	});

	it("maps every `name/` line to its directory pattern (property)", () => {
		fc.assert(
			fc.property(dirName, (name) => {
				expect(parseGitignoreLine(`${name}/`)).toBe(directoryPattern(name));
			}),
		);
	});
});

describe("buildExclusionPatterns", () => {
	it("always starts with the tooling exclusion", () => {
		expect(buildExclusionPatterns([])).toEqual([TOOLING_EXCLUSION]);
	});

	it("appends .gitignore patterns then extras", () => {
		expect(
			buildExclusionPatterns(["*/node_modules/*"], ["*/drafts/*"]),
		).toEqual([TOOLING_EXCLUSION, "*/node_modules/*", "*/drafts/*"]);
	});

	it("does not repeat the tooling exclusion when .gitignore lists it", () => {
		expect(buildExclusionPatterns([directoryPattern(".claude")])).toEqual([
			"*/.claude/*",
		]);
	});

	it("contains the tooling exclusion for any input (property)", () => {
		fc.assert(
			fc.property(fc.array(dirName.map(directoryPattern)), (patterns) => {
				const built = buildExclusionPatterns(patterns);
				expect(built[0]).toBe(TOOLING_EXCLUSION);
			}),
		);
	});
});
