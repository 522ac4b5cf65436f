// CHANGE: Test helper that materializes throwaway directory trees
// INVARIANT: Every tree lives under os.tmpdir(); cleanup() removes it recursively

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary tree.
 *
 * Postconditions:
 * - root points to the root directory of the tree
 * - cleanup() removes the directory recursively
 */
export interface TempTree {
	readonly root: string;
	readonly cleanup: () => void;
}

/**
 * Creates a tree from a map of relative POSIX paths to file contents.
 * Parent directories are created as needed.
 *
 * @example
 * ```ts
 * const t = createTempTree({ "README.md": "# hi\n", "docs/a.md": "" });
 * ```
 */
export function createTempTree(
	files: Readonly<Record<string, string>>,
): TempTree {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), "mdsweep-test-"));
	for (const [relative, content] of Object.entries(files)) {
		const target = path.join(root, ...relative.split("/"));
		fs.mkdirSync(path.dirname(target), { recursive: true });
		fs.writeFileSync(target, content, { encoding: "utf-8" });
	}
	return {
		root,
		cleanup: (): void => {
			fs.rmSync(root, { recursive: true, force: true });
		},
	};
}

/**
 * Runs `fn` against a fresh tree and always cleans up afterwards.
 */
export function withTempTree<T>(
	files: Readonly<Record<string, string>>,
	fn: (root: string) => T,
): T {
	const tree = createTempTree(files);
	try {
		return fn(tree.root);
	} finally {
		tree.cleanup();
	}
}
