// CHANGE: JSON value model and type guards shared by request and config parsing
// PURITY: CORE
// INVARIANT: Guards narrow without casts
// COMPLEXITY: O(1) per guard

import { Either } from "effect";

/**
 * Any value JSON.parse can produce.
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

export type JSONObject = { readonly [key: string]: JSONValue };

export function isJSONObject(
	value: JSONValue | undefined,
): value is JSONObject {
	return (
		value !== undefined &&
		value !== null &&
		typeof value === "object" &&
		!Array.isArray(value)
	);
}

export function isJSONArray(
	value: JSONValue | undefined,
): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

/**
 * Parses JSON text.
 *
 * @returns Right(value) or Left(parser message)
 * @pure true
 */
export const parseJson = (text: string): Either.Either<JSONValue, string> =>
	Either.try({
		// JSON.parse is typed `any`; JSONValue describes every value it returns
		try: () => JSON.parse(text) as JSONValue,
		catch: (cause) =>
			cause instanceof Error ? cause.message : "Invalid JSON",
	});
