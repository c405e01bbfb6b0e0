// CHANGE: Result Aggregator: ordering, tallies and final report assembly
// FORMAT THEOREM: ∀i<j: key(issues[i]) ≤ key(issues[j]) where key = (lineNumber ↑, severity ↓, rule order ↑)
// PURITY: CORE
// INVARIANT: totalIssues = critical + errors + warnings + info
// COMPLEXITY: O(n log n) where n = |issues|

import type { InvalidInputError } from "../errors.js";
import type { RuleRegistry } from "../rules/registry.js";
import { DEFAULT_COMPLEXITY } from "../scoring/complexity.js";
import { MAX_SCORE } from "../scoring/scores.js";
import { compareSeverityDesc } from "../types/index.js";
import type {
	AnalysisReport,
	ComplexityMetrics,
	Issue,
	LineMetrics,
	RuleFaultRecord,
} from "../types/index.js";
import {
	failureSummary,
	recommendations,
	reportStatus,
	summaryLine,
} from "./summary.js";
import type { SeverityTally } from "./summary.js";

/**
 * Sorts issues by line, then severity (highest first), then rule insertion order.
 *
 * @pure true
 * @complexity O(n log n)
 */
export function sortIssues(
	registry: RuleRegistry,
	issues: readonly Issue[],
): readonly Issue[] {
	return [...issues].sort(
		(a, b) =>
			a.lineNumber - b.lineNumber ||
			compareSeverityDesc(a.severity, b.severity) ||
			registry.orderOf(a.ruleId) - registry.orderOf(b.ruleId),
	);
}

/**
 * @pure true
 */
export function tallySeverities(issues: readonly Issue[]): SeverityTally {
	const count = (severity: Issue["severity"]): number =>
		issues.filter((issue) => issue.severity === severity).length;
	return {
		critical: count("critical"),
		errors: count("error"),
		warnings: count("warning"),
		info: count("info"),
	};
}

export interface ReportInput {
	readonly fileName: string | null;
	readonly issues: readonly Issue[];
	readonly faults: readonly RuleFaultRecord[];
	readonly securityScore: number;
	readonly performanceScore: number;
	readonly complexityMetrics: ComplexityMetrics;
	readonly lineMetrics: LineMetrics;
}

/**
 * Assembles a successful report.
 *
 * @pure true
 * @complexity O(n log n)
 */
export function buildReport(
	registry: RuleRegistry,
	input: ReportInput,
): AnalysisReport {
	const issues = sortIssues(registry, input.issues);
	const tally = tallySeverities(issues);
	return {
		success: true,
		fileName: input.fileName,
		totalIssues: issues.length,
		...tally,
		securityScore: input.securityScore,
		performanceScore: input.performanceScore,
		complexityMetrics: input.complexityMetrics,
		lineMetrics: input.lineMetrics,
		status: reportStatus(tally),
		issues,
		faults: input.faults,
		summary: summaryLine(issues.length, input.securityScore),
		recommendations: recommendations(issues),
		error: null,
	};
}

const EMPTY_LINE_METRICS: LineMetrics = {
	totalLines: 0,
	codeLines: 0,
	commentLines: 0,
	blankLines: 0,
	commentRatio: 0,
};

/**
 * Report for input that could not be analysed.
 *
 * @pure true
 * @invariant success = false ∧ issues = [] ∧ scores = 100
 */
export function failedReport(
	fileName: string | null,
	error: InvalidInputError,
): AnalysisReport {
	return {
		success: false,
		fileName,
		totalIssues: 0,
		critical: 0,
		errors: 0,
		warnings: 0,
		info: 0,
		securityScore: MAX_SCORE,
		performanceScore: MAX_SCORE,
		complexityMetrics: DEFAULT_COMPLEXITY,
		lineMetrics: EMPTY_LINE_METRICS,
		status: "failed",
		issues: [],
		faults: [],
		summary: failureSummary(error.detail),
		recommendations: [],
		error: error.detail,
	};
}
