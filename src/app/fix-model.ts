// CHANGE: Apply a caller-supplied fix model to delegable issues
// WHY: Model calls stay outside the core; a failing model never fails the report
// PURITY: APP
// EFFECT: Effect<AnalysisReport, never>
// INVARIANT: Only suggestedFix and fixSource of delegable issues change
// COMPLEXITY: O(n) model calls where n = delegable issues

import { Effect } from "effect";

import { describeError } from "../core/errors.js";
import type { FixModel } from "../core/fix/model.js";
import type { AnalysisReport, Issue } from "../core/types/index.js";

const proposeFor = (model: FixModel, issue: Issue): Effect.Effect<Issue> =>
	model.propose(issue).pipe(
		Effect.map((fix): Issue =>
			fix === null ? issue : { ...issue, suggestedFix: fix, fixSource: "model" },
		),
		Effect.catchAll((error) =>
			Effect.logWarning(describeError(error)).pipe(Effect.as(issue)),
		),
	);

/**
 * Fills delegable issues with proposals from the model.
 *
 * @effect Effect<AnalysisReport, never>
 * @invariant issue order, tallies and scores are unchanged
 */
export function applyFixModel(
	report: AnalysisReport,
	model: FixModel,
): Effect.Effect<AnalysisReport> {
	return Effect.forEach(report.issues, (issue) =>
		issue.delegable ? proposeFor(model, issue) : Effect.succeed(issue),
	).pipe(Effect.map((issues) => ({ ...report, issues })));
}
