// CHANGE: Path exclusion predicates used by the markdown walker
// FORMAT THEOREM: ∀d, p: canPruneDirectory(d, [p]) → ∀x: isExcluded(d + "/" + x, [p])
// PURITY: CORE
// INVARIANT: Pruning never changes the filtered file list, it only skips work
// COMPLEXITY: O(|patterns|) per query

import type { ExclusionPattern } from "../models.js";
import { matchesWildcard, toMatchPath } from "./wildcard.js";

/**
 * True when the root-relative path matches any exclusion pattern.
 *
 * @pure true
 */
export function isExcluded(
	relativePath: string,
	patterns: readonly ExclusionPattern[],
): boolean {
	const subject = toMatchPath(relativePath);
	return patterns.some((pattern) => matchesWildcard(pattern, subject));
}

/**
 * True when every path below `relativeDir` is excluded by a single pattern.
 *
 * Only patterns ending in `*` qualify: if `dir/` matches `Q*`, then so does
 * `dir/anything`, because the trailing star absorbs the suffix.
 *
 * @pure true
 */
export function canPruneDirectory(
	relativeDir: string,
	patterns: readonly ExclusionPattern[],
): boolean {
	const subject = `${toMatchPath(relativeDir)}/`;
	return patterns.some(
		(pattern) => pattern.endsWith("*") && matchesWildcard(pattern, subject),
	);
}

/**
 * Keeps only paths that match none of the patterns, preserving order.
 *
 * @pure true
 */
export function filterExcluded(
	relativePaths: readonly string[],
	patterns: readonly ExclusionPattern[],
): string[] {
	return relativePaths.filter((file) => !isExcluded(file, patterns));
}
