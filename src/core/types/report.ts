// CHANGE: Analysis options and report models
// PURITY: CORE
// INVARIANT: securityScore, performanceScore ∈ [0, 100]; totalIssues = critical + errors + warnings + info
// COMPLEXITY: O(1) - type declarations only

import type { Issue, RuleFaultRecord } from "./issue.js";
import type { Category } from "./severity.js";

/**
 * Categories to scan for a single analysis call.
 */
export interface AnalysisOptions {
	readonly enabledCategories: ReadonlySet<Category>;
}

export interface ComplexityMetrics {
	readonly cyclomaticComplexity: number;
	readonly maintainabilityIndex: number;
}

/**
 * @property commentRatio comment lines / (code lines + comment lines), 0 when both are 0
 */
export interface LineMetrics {
	readonly totalLines: number;
	readonly codeLines: number;
	readonly commentLines: number;
	readonly blankLines: number;
	readonly commentRatio: number;
}

export type ReportStatus = "critical" | "needs-attention" | "good" | "failed";

/**
 * Final, immutable result of one analysis call.
 *
 * @property error Present only when success = false
 */
export interface AnalysisReport {
	readonly success: boolean;
	readonly fileName: string | null;
	readonly totalIssues: number;
	readonly critical: number;
	readonly errors: number;
	readonly warnings: number;
	readonly info: number;
	readonly securityScore: number;
	readonly performanceScore: number;
	readonly complexityMetrics: ComplexityMetrics;
	readonly lineMetrics: LineMetrics;
	readonly status: ReportStatus;
	readonly issues: readonly Issue[];
	readonly faults: readonly RuleFaultRecord[];
	readonly summary: string;
	readonly recommendations: readonly string[];
	readonly error: string | null;
}
