// CHANGE: Issue model shared by scanner, fix engine and aggregator
// PURITY: CORE
// INVARIANT: 1 ≤ lineNumber ≤ total physical lines of the analysed unit
// COMPLEXITY: O(1) - type declarations only

import type { MatchCaptures } from "./rule.js";
import type { Category, Severity } from "./severity.js";

/**
 * Where a suggested fix came from.
 */
export type FixSource = "rule" | "model";

/**
 * Issue as emitted by the scanner, before fixes are attached.
 */
export interface RawIssue {
	readonly lineNumber: number;
	readonly ruleId: string;
	readonly category: Category;
	readonly severity: Severity;
	readonly title: string;
	readonly description: string;
	readonly codeSnippet: string;
	readonly cweId: string | null;
	readonly explanation: string | null;
	readonly captures: MatchCaptures;
}

/**
 * Finished issue as it appears in a report.
 *
 * @property delegable True when no deterministic fix exists and a FixModel may propose one
 */
export interface Issue {
	readonly lineNumber: number;
	readonly ruleId: string;
	readonly category: Category;
	readonly severity: Severity;
	readonly title: string;
	readonly description: string;
	readonly codeSnippet: string;
	readonly suggestedFix: string | null;
	readonly fixSource: FixSource | null;
	readonly delegable: boolean;
	readonly cweId: string | null;
	readonly explanation: string | null;
}

/**
 * Record of a rule that threw while being evaluated against one line.
 */
export interface RuleFaultRecord {
	readonly ruleId: string;
	readonly lineNumber: number;
	readonly detail: string;
}
