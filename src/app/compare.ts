// CHANGE: Compare two versions of the same source
// PURITY: APP
// EFFECT: Effect<Comparison, never>
// COMPLEXITY: O(cost(before) + cost(after))

import { Effect } from "effect";

import { compareReports } from "../core/report/compare.js";
import type { Comparison } from "../core/report/compare.js";
import type { AnalysisOptions } from "../core/types/index.js";
import { analyzeSourceEffect } from "./analyze.js";
import type { AnalyzeContext } from "./analyze.js";

/**
 * Analyses both versions with the same options and reports the difference.
 *
 * @effect Effect<Comparison, never>
 */
export function compareSourcesEffect(
	before: string,
	after: string,
	options: AnalysisOptions,
	context: AnalyzeContext = {},
): Effect.Effect<Comparison> {
	return Effect.all([
		analyzeSourceEffect(before, options, context),
		analyzeSourceEffect(after, options, context),
	]).pipe(
		Effect.map(([beforeReport, afterReport]) =>
			compareReports(beforeReport, afterReport),
		),
	);
}

export const compareSources = (
	before: string,
	after: string,
	options: AnalysisOptions,
	context: AnalyzeContext = {},
): Comparison =>
	Effect.runSync(compareSourcesEffect(before, after, options, context));
