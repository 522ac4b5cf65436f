// CHANGE: Wildcard matcher for exclusion patterns
// FORMAT THEOREM: ∀p, s: matchesWildcard(p, s) ↔ s ∈ L(p) where L('*') = Σ*, L('?') = Σ, L(c) = {c}
// PURITY: CORE
// INVARIANT: Only `*` and `?` are special; every other character is literal
// COMPLEXITY: O(|pattern|) to compile, regex engine bound to match

const REGEX_META = /[.+^${}()|[\]\\]/g;

/**
 * Compiles a wildcard pattern into an anchored regular expression.
 *
 * @pure true
 * @invariant result.source starts with `^` and ends with `$`
 *
 * @example
 * ```ts
 * wildcardToRegExp("/docs/?.md").test("/docs/a.md"); // true
 * wildcardToRegExp("/docs/?.md").test("/docs/ab.md"); // false
 * ```
 */
export function wildcardToRegExp(pattern: string): RegExp {
	let source = "";
	for (const char of pattern) {
		if (char === "*") {
			source += ".*";
		} else if (char === "?") {
			source += ".";
		} else {
			source += char.replace(REGEX_META, "\\$&");
		}
	}
	return new RegExp(`^${source}$`, "s");
}

const compiled = new Map<string, RegExp>();

/**
 * Tests `subject` against a wildcard pattern. Compiled patterns are memoized.
 *
 * @pure true (memoization is not observable)
 */
export function matchesWildcard(pattern: string, subject: string): boolean {
	let regex = compiled.get(pattern);
	if (regex === undefined) {
		regex = wildcardToRegExp(pattern);
		compiled.set(pattern, regex);
	}
	return regex.test(subject);
}

/**
 * Normalizes a root-relative path into the form patterns are tested against:
 * forward slashes, exactly one leading `/`.
 *
 * @pure true
 *
 * @example
 * ```ts
 * toMatchPath("docs\\guide.md"); // "/docs/guide.md"
 * toMatchPath("README.md");      // "/README.md"
 * ```
 */
export function toMatchPath(relativePath: string): string {
	const posix = relativePath.replace(/\\/g, "/").replace(/^\.\//, "");
	return posix.startsWith("/") ? posix : `/${posix}`;
}
