// CHANGE: Derive directory exclusion patterns from .gitignore text
// PURITY: CORE
// INVARIANT: Comment, blank and negation lines never yield a pattern
// INVARIANT: Output order follows line order; duplicates keep first occurrence
// COMPLEXITY: O(n) where n = |lines|
//
// NOTE: Deliberately not gitignore semantics. Only directory-like entries are
// recognised: `name/`, and bare names without wildcard or extension. A bare
// `LICENSE` is therefore treated as a directory name.

import { posix } from "node:path";

import type { ExclusionPattern } from "../models.js";

/**
 * Pattern that is always excluded regardless of .gitignore contents.
 */
export const TOOLING_EXCLUSION: ExclusionPattern = "*/.claude/*";

const WILDCARD_CHARS = /[*?[]/;

/**
 * Builds the pattern that matches directory `name` at any depth.
 *
 * @pure true
 */
export function directoryPattern(name: string): ExclusionPattern {
	return `*/${name}/*`;
}

function stripSlashes(value: string): string {
	return value.replace(/^\/+/, "").replace(/\/+$/, "");
}

function hasExtension(entry: string): boolean {
	return posix.extname(posix.basename(entry)).length > 0;
}

/**
 * Converts one .gitignore line into an exclusion pattern, or null when the
 * line is not directory-like.
 *
 * @pure true
 * @postcondition line ends with "/" ∧ ¬comment → result = directoryPattern(stripSlashes(line))
 */
export function parseGitignoreLine(line: string): ExclusionPattern | null {
	const entry = line.trim();
	if (entry.length === 0 || entry.startsWith("#") || entry.startsWith("!")) {
		return null;
	}

	const name = stripSlashes(entry);
	if (name.length === 0) {
		return null;
	}

	if (entry.endsWith("/")) {
		return directoryPattern(name);
	}

	if (!WILDCARD_CHARS.test(entry) && !hasExtension(name)) {
		return directoryPattern(name);
	}

	return null;
}

function dedupe(patterns: readonly ExclusionPattern[]): ExclusionPattern[] {
	return [...new Set(patterns)];
}

/**
 * Parses full .gitignore content.
 *
 * @pure true
 */
export function parseGitignore(content: string): ExclusionPattern[] {
	const patterns: ExclusionPattern[] = [];
	for (const line of content.split(/\r?\n/)) {
		const pattern = parseGitignoreLine(line);
		if (pattern !== null) {
			patterns.push(pattern);
		}
	}
	return dedupe(patterns);
}

/**
 * Final ordered exclusion list: tooling pattern first, then .gitignore-derived
 * patterns, then configured extras.
 *
 * @pure true
 * @invariant result[0] === TOOLING_EXCLUSION
 */
export function buildExclusionPatterns(
	gitignorePatterns: readonly ExclusionPattern[],
	extra: readonly ExclusionPattern[] = [],
): ExclusionPattern[] {
	return dedupe([TOOLING_EXCLUSION, ...gitignorePatterns, ...extra]);
}
