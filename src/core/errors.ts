// CHANGE: Typed domain error ADT for the sweep using Effect.Data
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Linter executable not usable (missing, not runnable, broken install).
 *
 * @pure true (Data class)
 * @invariant command.length > 0
 */
export class PreflightFailed extends Data.TaggedError("PreflightFailed")<{
	readonly command: string;
	readonly detail: string;
}> {}

/**
 * External tool could not be spawned or waited on.
 *
 * @pure true (Data class)
 * @invariant reason.length > 0
 */
export class ExternalToolError extends Data.TaggedError("ExternalToolError")<{
	readonly tool: "linter";
	readonly reason: string;
}> {}

/**
 * Config file exists but is not valid JSON or has wrongly typed fields.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 */
export type AppError =
	| PreflightFailed
	| ExternalToolError
	| ConfigError
	| FSError;
