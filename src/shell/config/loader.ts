// CHANGE: Load and validate code-scan.config.json
// WHY: A missing file means defaults; a malformed one is a typed ConfigError, never a silent fallback
// PURITY: SHELL (file system access)
// EFFECT: Effect<AnalyzerConfig, ConfigError>
// INVARIANT: Absent fields take their default values
// COMPLEXITY: O(n) where n = |file|

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Either, pipe } from "effect";

import { ConfigError } from "../../core/errors.js";
import { DEFAULT_CONFIG } from "../../core/settings.js";
import { isSeverityThreshold } from "../../core/types/index.js";
import type {
	AnalyzerConfig,
	OutputFormat,
	SeverityThreshold,
} from "../../core/types/index.js";
import { isJSONObject, parseJson } from "../../core/wire/json.js";
import type { JSONValue } from "../../core/wire/json.js";
import { parseWireOptions } from "../../core/wire/request.js";

export const CONFIG_FILE_NAME = "code-scan.config.json";

function parseFailOn(
	value: JSONValue | undefined,
	fail: (detail: string) => ConfigError,
): Either.Either<SeverityThreshold, ConfigError> {
	if (value === undefined) return Either.right(DEFAULT_CONFIG.failOn);
	return typeof value === "string" && isSeverityThreshold(value)
		? Either.right(value)
		: Either.left(
				fail("failOn must be one of critical, error, warning, info, none"),
			);
}

function parseFormat(
	value: JSONValue | undefined,
	fail: (detail: string) => ConfigError,
): Either.Either<OutputFormat, ConfigError> {
	if (value === undefined) return Either.right(DEFAULT_CONFIG.format);
	if (value === "pretty" || value === "json") return Either.right(value);
	return Either.left(fail("format must be pretty or json"));
}

/**
 * Validates parsed configuration JSON.
 *
 * @param value - Parsed file content
 * @param configPath - Used in error messages only
 *
 * @pure true
 */
export function parseAnalyzerConfig(
	value: JSONValue,
	configPath: string,
): Either.Either<AnalyzerConfig, ConfigError> {
	const fail = (detail: string): ConfigError =>
		new ConfigError({ path: configPath, detail });
	if (!isJSONObject(value)) {
		return Either.left(fail("config must be a JSON object"));
	}
	return Either.all({
		options: Either.mapLeft(parseWireOptions(value["options"]), (error) =>
			fail(error.detail),
		),
		failOn: parseFailOn(value["failOn"], fail),
		format: parseFormat(value["format"], fail),
	});
}

const readText = (configPath: string): Effect.Effect<string, ConfigError> =>
	Effect.try({
		try: () => fs.readFileSync(configPath, "utf8"),
		catch: (cause) =>
			new ConfigError({
				path: configPath,
				detail: cause instanceof Error ? cause.message : "Cannot read file",
			}),
	});

/**
 * Loads the analyzer configuration.
 *
 * @param configPath - Explicit path (from --config); a missing explicit file is an error
 * @param cwd - Directory searched for code-scan.config.json when no path is given
 *
 * @effect Effect<AnalyzerConfig, ConfigError>
 */
export function loadAnalyzerConfig(
	configPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<AnalyzerConfig, ConfigError> {
	const resolved = path.resolve(cwd, configPath ?? CONFIG_FILE_NAME);
	if (!fs.existsSync(resolved)) {
		return configPath === undefined
			? Effect.succeed(DEFAULT_CONFIG)
			: Effect.fail(
					new ConfigError({ path: resolved, detail: "Config file not found" }),
				);
	}
	return pipe(
		readText(resolved),
		Effect.flatMap((text) =>
			Effect.gen(function* () {
				const json = yield* Either.mapLeft(
					parseJson(text),
					(detail) => new ConfigError({ path: resolved, detail }),
				);
				return yield* parseAnalyzerConfig(json, resolved);
			}),
		),
	);
}
