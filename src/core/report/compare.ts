// CHANGE: Before/after comparison of two reports
// PURITY: CORE
// INVARIANT: improvement fields are after − before, except issuesFixed = before − after
// COMPLEXITY: O(1)

import type { AnalysisReport } from "../types/index.js";

export interface Improvement {
	readonly issuesFixed: number;
	readonly securityImprovement: number;
	readonly performanceImprovement: number;
	readonly complexityChange: number;
}

export interface Comparison {
	readonly before: AnalysisReport;
	readonly after: AnalysisReport;
	readonly improvement: Improvement;
	readonly summary: string;
}

/**
 * @pure true
 *
 * @example
 * ```ts
 * compareReports(before, after).summary
 * // => "Fixed 1 issues. Security improved by 25 points"
 * ```
 */
export function compareReports(
	before: AnalysisReport,
	after: AnalysisReport,
): Comparison {
	const improvement: Improvement = {
		issuesFixed: before.totalIssues - after.totalIssues,
		securityImprovement: after.securityScore - before.securityScore,
		performanceImprovement: after.performanceScore - before.performanceScore,
		complexityChange:
			after.complexityMetrics.cyclomaticComplexity -
			before.complexityMetrics.cyclomaticComplexity,
	};
	return {
		before,
		after,
		improvement,
		summary: `Fixed ${improvement.issuesFixed} issues. Security improved by ${improvement.securityImprovement} points`,
	};
}
