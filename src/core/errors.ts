// CHANGE: Typed error ADT for the analysis core using Effect.Data
// WHY: Errors are values discriminated by `_tag`; only InvalidInputError reaches a report as failure
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";
import { match } from "ts-pattern";

/**
 * Source text cannot be analysed: empty, binary or not valid UTF-8.
 *
 * @pure true (Data class)
 * @invariant reason ∈ {empty, binary, undecodable}
 */
export class InvalidInputError extends Data.TaggedError("InvalidInputError")<{
	readonly reason: "empty" | "binary" | "undecodable";
	readonly detail: string;
}> {}

/**
 * A single rule threw while evaluated against one line.
 * Recorded in the report and skipped; never aborts a scan.
 *
 * @pure true (Data class)
 * @invariant lineNumber ≥ 1
 */
export class RuleEvaluationFault extends Data.TaggedError(
	"RuleEvaluationFault",
)<{
	readonly ruleId: string;
	readonly lineNumber: number;
	readonly detail: string;
}> {}

/**
 * Rule catalog rejected at registry construction time.
 *
 * @pure true (Data class)
 */
export class RegistryError extends Data.TaggedError("RegistryError")<{
	readonly detail: string;
}> {}

/**
 * Wire request failed validation.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class InvalidRequestError extends Data.TaggedError(
	"InvalidRequestError",
)<{
	readonly detail: string;
}> {}

/**
 * Configuration file exists but is malformed.
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
 * A caller-supplied fix model failed to propose a fix.
 */
export class FixModelError extends Data.TaggedError("FixModelError")<{
	readonly ruleId: string;
	readonly lineNumber: number;
	readonly detail: string;
}> {}

/**
 * Batch request exceeds the entry limit.
 */
export class BatchLimitError extends Data.TaggedError("BatchLimitError")<{
	readonly limit: number;
	readonly received: number;
}> {}

/**
 * Command line arguments could not be understood.
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| InvalidInputError
	| RuleEvaluationFault
	| RegistryError
	| InvalidRequestError
	| ConfigError
	| FSError
	| FixModelError
	| BatchLimitError
	| UsageError;

/**
 * Human-readable message for any application error.
 *
 * @pure true
 * @complexity O(1)
 */
export const describeError = (error: AppError): string =>
	match(error)
		.with({ _tag: "InvalidInputError" }, (e) => e.detail)
		.with(
			{ _tag: "RuleEvaluationFault" },
			(e) => `rule ${e.ruleId} failed on line ${e.lineNumber}: ${e.detail}`,
		)
		.with({ _tag: "RegistryError" }, (e) => e.detail)
		.with({ _tag: "InvalidRequestError" }, (e) => e.detail)
		.with({ _tag: "ConfigError" }, (e) => `${e.path}: ${e.detail}`)
		.with({ _tag: "FS" }, (e) =>
			e.path === undefined ? e.detail : `${e.path}: ${e.detail}`,
		)
		.with(
			{ _tag: "FixModelError" },
			(e) =>
				`fix model failed for ${e.ruleId} on line ${e.lineNumber}: ${e.detail}`,
		)
		.with(
			{ _tag: "BatchLimitError" },
			(e) =>
				`batch accepts at most ${e.limit} entries, received ${e.received}`,
		)
		.with({ _tag: "UsageError" }, (e) => e.detail)
		.exhaustive();
