// CHANGE: Report status, summary line, recommendations and score labels
// PURITY: CORE
// INVARIANT: Texts depend only on tallies, scores and the categories present
// COMPLEXITY: O(n) where n = |issues|

import type { Issue, ReportStatus } from "../types/index.js";

export interface SeverityTally {
	readonly critical: number;
	readonly errors: number;
	readonly warnings: number;
	readonly info: number;
}

/**
 * @pure true
 */
export const summaryLine = (totalIssues: number, securityScore: number): string =>
	`Found ${totalIssues} issues. Security score: ${securityScore}/100`;

/**
 * @pure true
 */
export const failureSummary = (message: string): string =>
	`Analysis failed: ${message}`;

/**
 * Overall status: critical if any critical issue, needs-attention if any error, good otherwise.
 *
 * @pure true
 */
export function reportStatus(tally: SeverityTally): ReportStatus {
	if (tally.critical > 0) return "critical";
	if (tally.errors > 0) return "needs-attention";
	return "good";
}

export const RECOMMENDATIONS = {
	security: "Fix security vulnerabilities immediately",
	performance: "Optimize performance bottlenecks",
	other: "Address the remaining code quality findings",
	none: "Code quality is good, no action needed",
} as const;

/**
 * One fixed recommendation per category group present.
 *
 * @pure true
 * @invariant result.length ≥ 1
 */
export function recommendations(issues: readonly Issue[]): readonly string[] {
	const has = (predicate: (issue: Issue) => boolean): boolean =>
		issues.some(predicate);
	const lines = [
		has((issue) => issue.category === "security") ? RECOMMENDATIONS.security : null,
		has((issue) => issue.category === "performance")
			? RECOMMENDATIONS.performance
			: null,
		has((issue) => issue.category !== "security" && issue.category !== "performance")
			? RECOMMENDATIONS.other
			: null,
	].filter((line): line is NonNullable<typeof line> => line !== null);
	return lines.length === 0 ? [RECOMMENDATIONS.none] : lines;
}

/**
 * Human label for a score: Excellent ≥ 80, Good ≥ 60, Needs Improvement ≥ 40, else Critical.
 *
 * @pure true
 */
export function scoreLabel(score: number): string {
	if (score >= 80) return "Excellent";
	if (score >= 60) return "Good";
	if (score >= 40) return "Needs Improvement";
	return "Critical";
}
