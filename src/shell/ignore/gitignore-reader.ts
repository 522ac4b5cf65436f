// CHANGE: Read .gitignore from disk and derive exclusion patterns
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<ExclusionPattern[], FSError>
// INVARIANT: Missing file → []
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { parseGitignore } from "../../core/ignore/gitignore.js";
import type { ExclusionPattern } from "../../core/models.js";

/**
 * Reads `gitignorePath` and returns the directory patterns it yields.
 *
 * @effect Effect<ExclusionPattern[], FSError>
 */
export function readGitignorePatterns(
	gitignorePath: string,
): Effect.Effect<ExclusionPattern[], FSError> {
	return Effect.try({
		try: () => {
			if (!fs.existsSync(gitignorePath)) {
				return [];
			}
			return parseGitignore(fs.readFileSync(gitignorePath, "utf8"));
		},
		catch: (error) =>
			new FSError({
				detail: `Failed to read .gitignore: ${String(error)}`,
				path: gitignorePath,
			}),
	});
}
