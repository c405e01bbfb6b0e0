// CHANGE: Validate and decode source units before analysis
// PURITY: CORE
// INVARIANT: Right(unit) → unit.text contains a non-whitespace character and no NUL
// COMPLEXITY: O(n) where n = |text|

import { Either } from "effect";

import { InvalidInputError } from "../errors.js";
import type { SourceUnit } from "../types/index.js";

/**
 * Builds a SourceUnit, rejecting text the analyzer cannot treat as source.
 *
 * @pure true
 * @invariant text.trim() = "" → Left(InvalidInputError{reason: "empty"})
 * @invariant text contains "\0" → Left(InvalidInputError{reason: "binary"})
 * @complexity O(n)
 */
export function makeSourceUnit(
	text: string,
	filename: string | null = null,
): Either.Either<SourceUnit, InvalidInputError> {
	if (text.trim().length === 0) {
		return Either.left(
			new InvalidInputError({
				reason: "empty",
				detail: "Source text is empty",
			}),
		);
	}
	if (text.includes("\u0000")) {
		return Either.left(
			new InvalidInputError({
				reason: "binary",
				detail: "Source text contains NUL bytes and looks binary",
			}),
		);
	}
	return Either.right({ text, filename });
}

/**
 * Decodes raw bytes as strict UTF-8 and validates the result.
 *
 * @pure true
 * @invariant invalid UTF-8 → Left(InvalidInputError{reason: "undecodable"})
 * @complexity O(n) where n = |bytes|
 */
export function decodeSourceBytes(
	bytes: Uint8Array,
	filename: string | null = null,
): Either.Either<SourceUnit, InvalidInputError> {
	const decoded = Either.try({
		try: () => new TextDecoder("utf-8", { fatal: true }).decode(bytes),
		catch: () =>
			new InvalidInputError({
				reason: "undecodable",
				detail: "Source is not valid UTF-8 text",
			}),
	});
	return Either.flatMap(decoded, (text) => makeSourceUnit(text, filename));
}

/**
 * Splits text into physical lines (CRLF, CR and LF terminators).
 *
 * @pure true
 * @invariant result.length ≥ 1
 */
export function splitLines(text: string): readonly string[] {
	return text.split(/\r\n|\r|\n/u);
}
