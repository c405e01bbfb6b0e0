// CHANGE: Read source files and JSON request files from disk
// WHY: Decoding and validation stay in the core; this module only moves bytes
// PURITY: SHELL
// EFFECT: Effect<Uint8Array, FSError>, Effect<JSONValue, FSError | InvalidRequestError>
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";

import { Effect, Either } from "effect";

import { FSError, InvalidRequestError } from "../../core/errors.js";
import { parseJson } from "../../core/wire/json.js";
import type { JSONValue } from "../../core/wire/json.js";

/**
 * Reads a file as raw bytes.
 *
 * @effect Effect<Uint8Array, FSError>
 */
export const readSourceFile = (
	filePath: string,
): Effect.Effect<Uint8Array, FSError> =>
	Effect.try({
		try: () => fs.readFileSync(filePath),
		catch: (cause) =>
			new FSError({
				path: filePath,
				detail: cause instanceof Error ? cause.message : "Cannot read file",
			}),
	});

/**
 * Reads and parses a JSON request file.
 *
 * @effect Effect<JSONValue, FSError | InvalidRequestError>
 */
export const readRequestFile = (
	filePath: string,
): Effect.Effect<JSONValue, FSError | InvalidRequestError> =>
	Effect.gen(function* () {
		const bytes = yield* readSourceFile(filePath);
		return yield* Either.mapLeft(
			parseJson(new TextDecoder().decode(bytes)),
			(detail) =>
				new InvalidRequestError({ detail: `${filePath}: ${detail}` }),
		);
	});
