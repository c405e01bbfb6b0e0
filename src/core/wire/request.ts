// CHANGE: Wire request validation and option mapping
// WHY: The boundary accepts loosely shaped JSON; the core only sees validated, typed requests
// PURITY: CORE
// INVARIANT: Missing option flags default to true; code_smells ↔ quality
// COMPLEXITY: O(k) where k = |request fields| (+ |codes| for batches)

import { Either, pipe } from "effect";

import { InvalidRequestError } from "../errors.js";
import type {
	AnalysisOptions,
	AnalysisRequest,
	BatchEntry,
	BatchRequest,
	Category,
	CompareRequest,
	WireOptionName,
	WireOptions,
	WireRequest,
} from "../types/index.js";
import { isJSONArray, isJSONObject } from "./json.js";
import type { JSONObject, JSONValue } from "./json.js";

export const DEFAULT_WIRE_OPTIONS: WireOptions = {
	syntax: true,
	security: true,
	performance: true,
	code_smells: true,
	complexity: true,
	dead_code: true,
	type_hints: true,
};

export const OPTION_CATEGORY: Readonly<Record<WireOptionName, Category>> = {
	syntax: "syntax",
	security: "security",
	performance: "performance",
	code_smells: "quality",
	complexity: "complexity",
	dead_code: "dead_code",
	type_hints: "type_hints",
};

export const WIRE_OPTION_NAMES: readonly WireOptionName[] = [
	"syntax",
	"security",
	"performance",
	"code_smells",
	"complexity",
	"dead_code",
	"type_hints",
];

export const isWireOptionName = (value: string): value is WireOptionName =>
	WIRE_OPTION_NAMES.some((name) => name === value);

const invalid = (detail: string): InvalidRequestError =>
	new InvalidRequestError({ detail });

/**
 * Maps wire flags onto the set of enabled categories.
 *
 * @pure true
 */
export function optionsToAnalysisOptions(options: WireOptions): AnalysisOptions {
	return {
		enabledCategories: new Set(
			WIRE_OPTION_NAMES.filter((name) => options[name]).map(
				(name) => OPTION_CATEGORY[name],
			),
		),
	};
}

/**
 * Validates an `options` object; absent or null means all defaults.
 *
 * @pure true
 * @invariant ∀name absent from value: result[name] = true
 */
export function parseWireOptions(
	value: JSONValue | undefined,
): Either.Either<WireOptions, InvalidRequestError> {
	if (value === undefined || value === null) {
		return Either.right(DEFAULT_WIRE_OPTIONS);
	}
	if (!isJSONObject(value)) {
		return Either.left(invalid("options must be an object"));
	}
	const wrong = WIRE_OPTION_NAMES.find(
		(name) => value[name] !== undefined && typeof value[name] !== "boolean",
	);
	if (wrong !== undefined) {
		return Either.left(invalid(`options.${wrong} must be a boolean`));
	}
	return Either.right({
		syntax: value["syntax"] !== false,
		security: value["security"] !== false,
		performance: value["performance"] !== false,
		code_smells: value["code_smells"] !== false,
		complexity: value["complexity"] !== false,
		dead_code: value["dead_code"] !== false,
		type_hints: value["type_hints"] !== false,
	});
}

function requireString(
	object: JSONObject,
	field: string,
): Either.Either<string, InvalidRequestError> {
	const value = object[field];
	return typeof value === "string"
		? Either.right(value)
		: Either.left(invalid(`${field} must be a string`));
}

function optionalName(
	object: JSONObject,
	field: string,
): Either.Either<string | null, InvalidRequestError> {
	const value = object[field];
	if (value === undefined || value === null) return Either.right(null);
	return typeof value === "string"
		? Either.right(value)
		: Either.left(invalid(`${field} must be a string`));
}

const requireObject = (
	value: JSONValue,
	what: string,
): Either.Either<JSONObject, InvalidRequestError> =>
	isJSONObject(value)
		? Either.right(value)
		: Either.left(invalid(`${what} must be a JSON object`));

/**
 * Validates a single-analysis request `{ code, file_name?, options? }`.
 * Empty code is accepted here; analysis reports it as invalid input.
 *
 * @pure true
 */
export function parseAnalysisRequest(
	value: JSONValue,
): Either.Either<AnalysisRequest, InvalidRequestError> {
	return pipe(
		requireObject(value, "request"),
		Either.flatMap((object) =>
			Either.all({
				code: requireString(object, "code"),
				file_name: optionalName(object, "file_name"),
				options: parseWireOptions(object["options"]),
			}),
		),
	);
}

export const MAX_BATCH_ENTRIES = 20;

function parseBatchEntry(
	value: JSONValue,
	index: number,
): Either.Either<BatchEntry, InvalidRequestError> {
	return pipe(
		requireObject(value, `codes[${index}]`),
		Either.flatMap((entry) =>
			Either.all({
				code: requireString(entry, "code"),
				name: optionalName(entry, "name"),
				fileName: optionalName(entry, "file_name"),
			}),
		),
		Either.map(({ code, name, fileName }) => ({
			code,
			file_name: name ?? fileName ?? `file_${index}.py`,
		})),
	);
}

/**
 * Validates a batch request `{ codes: [{ code, name? }], options? }`.
 * The entry limit is enforced by the batch operation, not here.
 *
 * @pure true
 */
export function parseBatchRequest(
	value: JSONValue,
): Either.Either<BatchRequest, InvalidRequestError> {
	return pipe(
		requireObject(value, "request"),
		Either.flatMap((object) => {
			const codes = object["codes"];
			return isJSONArray(codes)
				? Either.all({
						codes: Either.all(codes.map(parseBatchEntry)),
						options: parseWireOptions(object["options"]),
					})
				: Either.left(invalid("codes must be an array"));
		}),
	);
}

/**
 * Validates a comparison request `{ code_before, code_after, options? }`.
 *
 * @pure true
 */
export function parseCompareRequest(
	value: JSONValue,
): Either.Either<CompareRequest, InvalidRequestError> {
	return pipe(
		requireObject(value, "request"),
		Either.flatMap((object) =>
			Either.all({
				code_before: requireString(object, "code_before"),
				code_after: requireString(object, "code_after"),
				options: parseWireOptions(object["options"]),
			}),
		),
	);
}

/**
 * Recognises the request kind by its fields: `codes` → batch,
 * `code_before` → compare, anything else → single analysis.
 *
 * @pure true
 */
export function parseWireRequest(
	value: JSONValue,
): Either.Either<WireRequest, InvalidRequestError> {
	if (isJSONObject(value) && value["codes"] !== undefined) {
		return Either.map(parseBatchRequest(value), (request) => ({
			_tag: "Batch" as const,
			request,
		}));
	}
	if (isJSONObject(value) && value["code_before"] !== undefined) {
		return Either.map(parseCompareRequest(value), (request) => ({
			_tag: "Compare" as const,
			request,
		}));
	}
	return Either.map(parseAnalysisRequest(value), (request) => ({
		_tag: "Single" as const,
		request,
	}));
}
