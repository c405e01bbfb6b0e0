// CHANGE: Pure decision function to compute exit code from analysis reports
// WHY: Centralize termination logic in Functional Core with Effect composition support
// FORMAT THEOREM: ∀s ∈ State: (s.invalidInput ∨ s.hasBlockingIssues) ↔ computeExitCode(s) = 1
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping State → ExitCode
// COMPLEXITY: O(1) for computeExitCode, O(n) for deriveDecisionState where n = |issues|

import { pipe } from "effect";

import type { DecisionState, ExitCode } from "./models.js";
import type { AnalysisReport, SeverityThreshold } from "./types/index.js";
import { severityMeetsThreshold } from "./types/index.js";

/**
 * Computes process exit code from decision state (pure function).
 *
 * @param state - Immutable flags computed from reports
 * @returns 1 if input was invalid or a blocking issue exists; otherwise 0
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @postcondition (state.invalidInput ∨ state.hasBlockingIssues) → result = 1
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const exitCode = computeExitCode({ invalidInput: false, hasBlockingIssues: true });
 * // exitCode === 1
 * ```
 */
export const computeExitCode = (state: DecisionState): ExitCode =>
	pipe(
		state,
		(s) => s.invalidInput || s.hasBlockingIssues,
		(blocked): ExitCode => (blocked ? 1 : 0),
	);

/**
 * Derives the decision state of one or more reports against a severity threshold.
 *
 * @pure true
 * @invariant failOn = "none" → hasBlockingIssues = false
 * @complexity O(n) where n = Σ |report.issues|
 */
export function deriveDecisionState(
	reports: readonly AnalysisReport[],
	failOn: SeverityThreshold,
): DecisionState {
	return {
		invalidInput: reports.some((report) => !report.success),
		hasBlockingIssues: reports.some((report) =>
			report.issues.some((issue) =>
				severityMeetsThreshold(issue.severity, failOn),
			),
		),
	};
}
