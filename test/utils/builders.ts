// CHANGE: Shared builders for analysis tests
// WHY: Options, line extraction and issue fixtures are reused across core and app tests

import { extractStructure } from "../../src/core/extract/structure.js";
import { CATEGORIES } from "../../src/core/types/index.js";
import type {
	AnalysisOptions,
	Category,
	Issue,
	LineContext,
} from "../../src/core/types/index.js";

export const ALL: AnalysisOptions = { enabledCategories: new Set(CATEGORIES) };

/** Options with exactly the given categories enabled. */
export const only = (...categories: readonly Category[]): AnalysisOptions => ({
	enabledCategories: new Set(categories),
});

/** Lines of source as the extractor sees them. */
export const linesOf = (text: string): readonly LineContext[] =>
	extractStructure({ text, filename: null });

/** Sorted construct tags of one line (1-based). */
export const tagsAt = (text: string, lineNumber: number): readonly string[] =>
	[...(linesOf(text)[lineNumber - 1]?.constructs ?? [])].sort();

/** Build an issue with sensible defaults. */
export const issue = (over: Partial<Issue> = {}): Issue => ({
	lineNumber: 1,
	ruleId: "quality-todo-comment",
	category: "quality",
	severity: "info",
	title: "title",
	description: "description",
	codeSnippet: "x = 1",
	suggestedFix: null,
	fixSource: null,
	delegable: true,
	cweId: null,
	explanation: null,
	...over,
});
