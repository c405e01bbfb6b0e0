// CHANGE: Per-entry batch results and batch totals
// PURITY: CORE
// INVARIANT: totalProcessed = successful + failed = |results|
// COMPLEXITY: O(n) where n = |reports|

import type { AnalysisReport } from "../types/index.js";

export interface BatchEntryResult {
	readonly index: number;
	readonly fileName: string;
	readonly success: boolean;
	readonly totalIssues: number;
	readonly critical: number;
	readonly errors: number;
	readonly warnings: number;
	readonly securityScore: number;
	readonly performanceScore: number;
	readonly error: string | null;
}

export interface BatchResult {
	readonly totalProcessed: number;
	readonly successful: number;
	readonly failed: number;
	readonly results: readonly BatchEntryResult[];
	readonly reports: readonly AnalysisReport[];
}

const entryResult = (
	report: AnalysisReport,
	index: number,
): BatchEntryResult => ({
	index,
	fileName: report.fileName ?? `file_${index}.py`,
	success: report.success,
	totalIssues: report.totalIssues,
	critical: report.critical,
	errors: report.errors,
	warnings: report.warnings,
	securityScore: report.securityScore,
	performanceScore: report.performanceScore,
	error: report.error,
});

/**
 * Summarises reports produced for batch entries, in entry order.
 *
 * @pure true
 */
export function summarizeBatch(reports: readonly AnalysisReport[]): BatchResult {
	const results = reports.map(entryResult);
	const successful = results.filter((result) => result.success).length;
	return {
		totalProcessed: results.length,
		successful,
		failed: results.length - successful,
		results,
		reports,
	};
}
