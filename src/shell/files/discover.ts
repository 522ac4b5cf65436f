// CHANGE: Synchronous recursive markdown discovery with exclusion filtering
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<string[], FSError>
// INVARIANT: Result contains only root-relative `/`-separated *.md paths matching no pattern
// INVARIANT: Entries are visited in lexicographic order; symlinks are not followed
// COMPLEXITY: O(n) where n = entries below root (minus pruned subtrees)

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { FSError } from "../../core/errors.js";
import { canPruneDirectory, isExcluded } from "../../core/ignore/exclusion.js";
import type { ExclusionPattern } from "../../core/models.js";

const MARKDOWN_EXTENSION = ".md";

function isMarkdown(name: string): boolean {
	return name.toLowerCase().endsWith(MARKDOWN_EXTENSION);
}

function joinRelative(parent: string, name: string): string {
	return parent.length === 0 ? name : `${parent}/${name}`;
}

function walk(
	root: string,
	relativeDir: string,
	patterns: readonly ExclusionPattern[],
	found: string[],
): void {
	const entries = fs
		.readdirSync(path.join(root, relativeDir), { withFileTypes: true })
		.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

	for (const entry of entries) {
		const relative = joinRelative(relativeDir, entry.name);
		if (entry.isDirectory()) {
			if (!canPruneDirectory(relative, patterns)) {
				walk(root, relative, patterns, found);
			}
		} else if (entry.isFile() && isMarkdown(entry.name)) {
			if (!isExcluded(relative, patterns)) {
				found.push(relative);
			}
		}
	}
}

/**
 * Lists every markdown file under `root` that matches no exclusion pattern.
 *
 * @param root Absolute directory to walk
 * @effect Effect<string[], FSError>
 *
 * @example
 * ```ts
 * // .gitignore: node_modules/
 * // tree: README.md, node_modules/sub/doc.md, .claude/notes.md
 * const patterns = buildExclusionPatterns([directoryPattern("node_modules")]);
 * discoverMarkdownFiles("/repo", patterns); // → ["README.md"]
 * ```
 */
export function discoverMarkdownFiles(
	root: string,
	patterns: readonly ExclusionPattern[],
): Effect.Effect<string[], FSError> {
	return Effect.try({
		try: () => {
			const found: string[] = [];
			walk(root, "", patterns, found);
			return found;
		},
		catch: (error) =>
			new FSError({
				detail: `Failed to walk directory: ${String(error)}`,
				path: root,
			}),
	});
}
