// CHANGE: Load and validate mdsweep.config.json
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<SweepConfig, ConfigError>
// INVARIANT: Missing file → DEFAULT_CONFIG; any present field is type-checked
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import {
	DEFAULT_CONFIG,
	type LinterCommand,
	type SweepConfig,
} from "../../core/types/index.js";

/**
 * Type representing any valid JSON value.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Result of validating one field: the value or a message naming the field.
 */
export type FieldResult<T> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly detail: string };

function stringListField(
	raw: JSONObject,
	key: "disabledRules" | "crashMarkers" | "exclude",
): FieldResult<ReadonlyArray<string>> {
	const value = raw[key];
	if (value === undefined) return { ok: true, value: DEFAULT_CONFIG[key] };
	if (!isStringArray(value)) {
		return { ok: false, detail: `"${key}" must be an array of strings` };
	}
	return { ok: true, value };
}

function timeoutField(raw: JSONObject): FieldResult<number | null> {
	const value = raw["timeoutMs"];
	if (value === undefined || value === null) {
		return { ok: true, value: DEFAULT_CONFIG.timeoutMs };
	}
	if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
		return {
			ok: false,
			detail: `"timeoutMs" must be a non-negative integer or null`,
		};
	}
	return { ok: true, value };
}

function linterField(raw: JSONObject): FieldResult<LinterCommand> {
	const value = raw["linter"];
	if (value === undefined) return { ok: true, value: DEFAULT_CONFIG.linter };
	if (!isJSONObject(value)) {
		return { ok: false, detail: `"linter" must be an object` };
	}
	const command = value["command"] ?? DEFAULT_CONFIG.linter.command;
	const args = value["args"] ?? DEFAULT_CONFIG.linter.args;
	if (typeof command !== "string" || command.trim().length === 0) {
		return { ok: false, detail: `"linter.command" must be a non-empty string` };
	}
	if (!isStringArray(args)) {
		return { ok: false, detail: `"linter.args" must be an array of strings` };
	}
	return { ok: true, value: { command, args } };
}

/**
 * Validates parsed JSON against the config shape.
 *
 * @returns SweepConfig or the first validation problem found
 * @pure true
 */
export function validateSweepConfig(
	parsed: JSONValue,
): FieldResult<SweepConfig> {
	if (!isJSONObject(parsed)) {
		return { ok: false, detail: "config root must be a JSON object" };
	}
	const linter = linterField(parsed);
	if (!linter.ok) return linter;
	const disabledRules = stringListField(parsed, "disabledRules");
	if (!disabledRules.ok) return disabledRules;
	const crashMarkers = stringListField(parsed, "crashMarkers");
	if (!crashMarkers.ok) return crashMarkers;
	const exclude = stringListField(parsed, "exclude");
	if (!exclude.ok) return exclude;
	const timeoutMs = timeoutField(parsed);
	if (!timeoutMs.ok) return timeoutMs;

	return {
		ok: true,
		value: {
			linter: linter.value,
			disabledRules: disabledRules.value,
			crashMarkers: crashMarkers.value,
			exclude: exclude.value,
			timeoutMs: timeoutMs.value,
		},
	};
}

function parseJSON(
	raw: string,
	configPath: string,
): Effect.Effect<JSONValue, ConfigError> {
	return Effect.try({
		try: () => JSON.parse(raw) as JSONValue,
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
			}),
	});
}

/**
 * Загружает конфигурацию из mdsweep.config.json.
 *
 * @param configPath Absolute path to the config file
 * @effect Effect<SweepConfig, ConfigError>
 */
export function loadSweepConfig(
	configPath: string,
): Effect.Effect<SweepConfig, ConfigError> {
	return Effect.gen(function* () {
		if (!fs.existsSync(configPath)) {
			return DEFAULT_CONFIG;
		}
		const raw = yield* Effect.try({
			try: () => fs.readFileSync(configPath, "utf8"),
			catch: (error) =>
				new ConfigError({ path: configPath, detail: String(error) }),
		});
		const parsed = yield* parseJSON(raw, configPath);
		const validated = validateSweepConfig(parsed);
		if (!validated.ok) {
			return yield* Effect.fail(
				new ConfigError({ path: configPath, detail: validated.detail }),
			);
		}
		return validated.value;
	});
}
