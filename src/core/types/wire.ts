// CHANGE: Request and response shapes consumed and produced at the service boundary
// PURITY: CORE
// INVARIANT: Field names match the JSON contract exactly (snake_case)
// COMPLEXITY: O(1) - type declarations only

import type { ReportStatus } from "./report.js";
import type { Severity } from "./severity.js";

/**
 * Per-call option flags as sent by clients.
 */
export interface WireOptions {
	readonly syntax: boolean;
	readonly security: boolean;
	readonly performance: boolean;
	readonly code_smells: boolean;
	readonly complexity: boolean;
	readonly dead_code: boolean;
	readonly type_hints: boolean;
}

export type WireOptionName = keyof WireOptions;

export interface AnalysisRequest {
	readonly code: string;
	readonly file_name: string | null;
	readonly options: WireOptions;
}

export type WireIssueType = "security" | "performance" | "quality" | "syntax";

export interface WireIssue {
	readonly line_number: number;
	readonly severity: Severity;
	readonly issue_type: WireIssueType;
	readonly rule_id: string;
	readonly description: string;
	readonly code_snippet: string;
	readonly suggested_fix: string | null;
	readonly explanation: string | null;
	readonly cwe_id: string | null;
}

export interface WireReport {
	readonly success: boolean;
	readonly file_name: string | null;
	readonly total_issues: number;
	readonly critical: number;
	readonly errors: number;
	readonly warnings: number;
	readonly info: number;
	readonly security_score: number;
	readonly performance_score: number;
	readonly complexity_metrics: {
		readonly cyclomatic_complexity: number;
		readonly maintainability_index: number;
	};
	readonly status: ReportStatus;
	readonly issues: readonly WireIssue[];
	readonly summary: string;
	readonly error: string | null;
}

export interface BatchEntry {
	readonly code: string;
	readonly file_name: string;
}

export interface BatchRequest {
	readonly codes: readonly BatchEntry[];
	readonly options: WireOptions;
}

export interface CompareRequest {
	readonly code_before: string;
	readonly code_after: string;
	readonly options: WireOptions;
}

/**
 * Any request the service boundary accepts, discriminated by shape.
 */
export type WireRequest =
	| { readonly _tag: "Single"; readonly request: AnalysisRequest }
	| { readonly _tag: "Batch"; readonly request: BatchRequest }
	| { readonly _tag: "Compare"; readonly request: CompareRequest };
