// CHANGE: Serialise reports into the snake_case wire format
// PURITY: CORE
// INVARIANT: issue_type ∈ {security, performance, quality, syntax}
// COMPLEXITY: O(n) where n = |issues|

import { match } from "ts-pattern";

import type { BatchResult } from "../report/batch.js";
import type { Comparison } from "../report/compare.js";
import type {
	AnalysisReport,
	Category,
	Issue,
	WireIssue,
	WireIssueType,
	WireReport,
} from "../types/index.js";

/**
 * Wire issue type: quality also covers complexity, dead code and type hints.
 *
 * @pure true
 */
export const wireIssueType = (category: Category): WireIssueType =>
	match(category)
		.with("security", () => "security" as const)
		.with("performance", () => "performance" as const)
		.with("syntax", () => "syntax" as const)
		.with("quality", "complexity", "dead_code", "type_hints", () => "quality" as const)
		.exhaustive();

const toWireIssue = (issue: Issue): WireIssue => ({
	line_number: issue.lineNumber,
	severity: issue.severity,
	issue_type: wireIssueType(issue.category),
	rule_id: issue.ruleId,
	description: issue.description,
	code_snippet: issue.codeSnippet,
	suggested_fix: issue.suggestedFix,
	explanation: issue.explanation,
	cwe_id: issue.cweId,
});

/**
 * @pure true
 */
export function toWireReport(report: AnalysisReport): WireReport {
	return {
		success: report.success,
		file_name: report.fileName,
		total_issues: report.totalIssues,
		critical: report.critical,
		errors: report.errors,
		warnings: report.warnings,
		info: report.info,
		security_score: report.securityScore,
		performance_score: report.performanceScore,
		complexity_metrics: {
			cyclomatic_complexity: report.complexityMetrics.cyclomaticComplexity,
			maintainability_index: report.complexityMetrics.maintainabilityIndex,
		},
		status: report.status,
		issues: report.issues.map(toWireIssue),
		summary: report.summary,
		error: report.error,
	};
}

/**
 * @pure true
 */
export const toWireBatch = (batch: BatchResult) => ({
	success: true,
	total_processed: batch.totalProcessed,
	successful: batch.successful,
	failed: batch.failed,
	results: batch.results.map((result) => ({
		index: result.index,
		file_name: result.fileName,
		success: result.success,
		total_issues: result.totalIssues,
		critical: result.critical,
		errors: result.errors,
		warnings: result.warnings,
		security_score: result.securityScore,
		performance_score: result.performanceScore,
		error: result.error,
	})),
});

/**
 * @pure true
 */
export const toWireComparison = (comparison: Comparison) => ({
	success: true,
	before: toWireReport(comparison.before),
	after: toWireReport(comparison.after),
	improvement: {
		issues_fixed: comparison.improvement.issuesFixed,
		security_improvement: comparison.improvement.securityImprovement,
		performance_improvement: comparison.improvement.performanceImprovement,
		complexity_change: comparison.improvement.complexityChange,
	},
	summary: comparison.summary,
});
