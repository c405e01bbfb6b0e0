// CHANGE: Rule definitions as plain data with a tagged matcher variant
// WHY: Dispatch over the matcher happens in scan/evaluate.ts with ts-pattern; rules carry no behaviour of their own
// PURITY: CORE
// INVARIANT: Rule values are frozen once a registry is built
// COMPLEXITY: O(1) - type declarations only

import type { Category, Severity } from "./severity.js";
import type { LineContext } from "./source.js";

/**
 * Regular expression applied to LineContext.rawText.
 * Capture groups feed the description and fix templates.
 */
export interface PatternMatcher {
	readonly _tag: "Pattern";
	readonly pattern: RegExp;
}

/**
 * Predicate over the structural facts of one line.
 */
export interface StructuralMatcher {
	readonly _tag: "Structural";
	readonly predicate: (line: LineContext) => boolean;
}

export type Matcher = PatternMatcher | StructuralMatcher;

/**
 * Immutable detection rule.
 *
 * @property descriptionTemplate Rendered with the match captures (see rules/template.ts)
 * @property fixTemplate Deterministic fix; null marks issues as delegable to a fix model
 */
export interface Rule {
	readonly id: string;
	readonly title: string;
	readonly category: Category;
	readonly severity: Severity;
	readonly matcher: Matcher;
	readonly cweId: string | null;
	readonly descriptionTemplate: string;
	readonly fixTemplate: string | null;
	readonly explanation: string | null;
}

/**
 * Values a template may reference: positional groups, named groups and the trimmed line.
 */
export interface MatchCaptures {
	readonly groups: readonly string[];
	readonly named: Readonly<Record<string, string>>;
	readonly line: string;
}

export const pattern = (regex: RegExp): PatternMatcher => ({
	_tag: "Pattern",
	pattern: regex,
});

export const structural = (
	predicate: (line: LineContext) => boolean,
): StructuralMatcher => ({
	_tag: "Structural",
	predicate,
});
