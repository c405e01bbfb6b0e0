// CHANGE: Caller-supplied fix model contract
// PURITY: CORE (interface only; implementations live with the caller)
// EFFECT: Effect<string | null, FixModelError>

import type { Effect } from "effect";

import type { FixModelError } from "../errors.js";
import type { Issue } from "../types/index.js";

/**
 * Proposes a fix for an issue that has no deterministic one.
 * Returning null means "no proposal"; the issue stays delegable.
 *
 * @example
 * ```ts
 * const model: FixModel = {
 *   propose: (issue) => Effect.succeed(`# review: ${issue.title}`),
 * };
 * ```
 */
export interface FixModel {
	readonly propose: (
		issue: Issue,
	) => Effect.Effect<string | null, FixModelError>;
}
