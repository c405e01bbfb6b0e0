// CHANGE: Render reports, batches and comparisons as text
// WHY: Output formatting is pure; the printer only writes the returned string
// PURITY: CORE
// INVARIANT: json output is exactly the wire format, pretty-printed with two spaces
// COMPLEXITY: O(n) where n = |issues|

import { match } from "ts-pattern";

import type { BatchResult } from "../report/batch.js";
import type { Comparison } from "../report/compare.js";
import { scoreLabel } from "../report/summary.js";
import type { AnalysisReport, Issue, OutputFormat } from "../types/index.js";
import { toWireBatch, toWireComparison, toWireReport } from "../wire/report.js";

/**
 * Anything the CLI prints.
 */
export type Outcome =
	| { readonly _tag: "Report"; readonly report: AnalysisReport }
	| { readonly _tag: "Batch"; readonly batch: BatchResult }
	| { readonly _tag: "Comparison"; readonly comparison: Comparison };

const displayName = (report: AnalysisReport): string =>
	report.fileName ?? "<input>";

function renderIssue(issue: Issue): string {
	const cwe = issue.cweId === null ? "" : ` [${issue.cweId}]`;
	const lines = [
		`  ${issue.lineNumber}  ${issue.severity.padEnd(8)}  ${issue.ruleId}${cwe}`,
		`      ${issue.description}`,
		`      > ${issue.codeSnippet}`,
	];
	return issue.suggestedFix === null
		? lines.join("\n")
		: [...lines, `      fix: ${issue.suggestedFix}`].join("\n");
}

function renderHeader(report: AnalysisReport): readonly string[] {
	const { complexityMetrics: cm, lineMetrics: lm } = report;
	return [
		`${displayName(report)}: ${report.status}`,
		`  Issues: ${report.totalIssues} (critical ${report.critical}, error ${report.errors}, warning ${report.warnings}, info ${report.info})`,
		`  Security score: ${report.securityScore}/100 (${scoreLabel(report.securityScore)})`,
		`  Performance score: ${report.performanceScore}/100 (${scoreLabel(report.performanceScore)})`,
		`  Complexity: cyclomatic ${cm.cyclomaticComplexity}, maintainability ${cm.maintainabilityIndex}`,
		`  Lines: ${lm.totalLines} total, ${lm.codeLines} code, ${lm.commentLines} comment, ${lm.blankLines} blank`,
	];
}

/**
 * @pure true
 */
export function renderReportPretty(report: AnalysisReport): string {
	if (!report.success) {
		return `${displayName(report)}: failed\n  ${report.summary}`;
	}
	const faults = report.faults.map(
		(fault) => `  ${fault.ruleId} line ${fault.lineNumber}: ${fault.detail}`,
	);
	const sections = [
		renderHeader(report).join("\n"),
		...report.issues.map(renderIssue),
		...(faults.length === 0 ? [] : [["Rule faults:", ...faults].join("\n")]),
		["Recommendations:", ...report.recommendations.map((r) => `  - ${r}`)].join(
			"\n",
		),
		report.summary,
	];
	return sections.join("\n\n");
}

/**
 * @pure true
 */
export function renderBatchPretty(batch: BatchResult): string {
	const rows = batch.results.map((result) =>
		result.success
			? `  [${result.index}] ${result.fileName}: ${result.totalIssues} issues, security ${result.securityScore}/100, performance ${result.performanceScore}/100`
			: `  [${result.index}] ${result.fileName}: failed (${result.error ?? "unknown error"})`,
	);
	return [
		`Processed ${batch.totalProcessed} files: ${batch.successful} analysed, ${batch.failed} failed`,
		...rows,
	].join("\n");
}

/**
 * @pure true
 */
export function renderComparisonPretty(comparison: Comparison): string {
	const { improvement } = comparison;
	return [
		renderReportPretty(comparison.before),
		renderReportPretty(comparison.after),
		[
			"Improvement:",
			`  Issues fixed: ${improvement.issuesFixed}`,
			`  Security: ${improvement.securityImprovement}`,
			`  Performance: ${improvement.performanceImprovement}`,
			`  Complexity change: ${improvement.complexityChange}`,
		].join("\n"),
		comparison.summary,
	].join("\n\n");
}

const toJson = (value: object): string => JSON.stringify(value, null, 2);

/**
 * Renders an outcome in the requested format.
 *
 * @pure true
 */
export const renderOutcome = (outcome: Outcome, format: OutputFormat): string =>
	match([outcome, format] as const)
		.with([{ _tag: "Report" }, "pretty"], ([o]) => renderReportPretty(o.report))
		.with([{ _tag: "Report" }, "json"], ([o]) => toJson(toWireReport(o.report)))
		.with([{ _tag: "Batch" }, "pretty"], ([o]) => renderBatchPretty(o.batch))
		.with([{ _tag: "Batch" }, "json"], ([o]) => toJson(toWireBatch(o.batch)))
		.with([{ _tag: "Comparison" }, "pretty"], ([o]) =>
			renderComparisonPretty(o.comparison),
		)
		.with([{ _tag: "Comparison" }, "json"], ([o]) =>
			toJson(toWireComparison(o.comparison)),
		)
		.exhaustive();

/**
 * Reports contained in an outcome, for the exit-code decision.
 *
 * @pure true
 */
export const outcomeReports = (outcome: Outcome): readonly AnalysisReport[] =>
	match(outcome)
		.with({ _tag: "Report" }, (o) => [o.report])
		.with({ _tag: "Batch" }, (o) => o.batch.reports)
		.with({ _tag: "Comparison" }, (o) => [o.comparison.after])
		.exhaustive();
