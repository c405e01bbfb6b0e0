// CHANGE: Evaluate one rule against one line and build the raw issue
// WHY: Matcher dispatch lives in one place; ts-pattern keeps it exhaustive over matcher tags
// PURITY: CORE
// INVARIANT: Pattern matchers are applied to rawText, structural predicates to the whole LineContext
// COMPLEXITY: O(|line|)

import { Option } from "effect";
import { match } from "ts-pattern";

import { lineCaptures, regexCaptures, renderTemplate } from "../rules/template.js";
import type {
	LineContext,
	MatchCaptures,
	RawIssue,
	Rule,
} from "../types/index.js";

export const SNIPPET_LIMIT = 160;

/**
 * Trimmed line capped at SNIPPET_LIMIT characters, with `…` when cut.
 *
 * @pure true
 * @invariant result.length ≤ SNIPPET_LIMIT + 1
 */
export function codeSnippet(rawText: string): string {
	const trimmed = rawText.trim();
	return trimmed.length > SNIPPET_LIMIT
		? `${trimmed.slice(0, SNIPPET_LIMIT)}…`
		: trimmed;
}

/**
 * Applies a rule's matcher to a line.
 * May throw when a stand-in predicate throws; callers wrap it in a fault barrier.
 *
 * @returns Some(captures) on a match, None otherwise
 * @complexity O(|line|)
 */
export const evaluateRule = (
	rule: Rule,
	line: LineContext,
): Option.Option<MatchCaptures> =>
	match(rule.matcher)
		.with({ _tag: "Pattern" }, (matcher) =>
			Option.map(Option.fromNullable(matcher.pattern.exec(line.rawText)), (found) =>
				regexCaptures(found, line.rawText),
			),
		)
		.with({ _tag: "Structural" }, (matcher) =>
			matcher.predicate(line)
				? Option.some(lineCaptures(line.rawText))
				: Option.none(),
		)
		.exhaustive();

/**
 * @pure true
 */
export const toRawIssue = (
	rule: Rule,
	line: LineContext,
	captures: MatchCaptures,
): RawIssue => ({
	lineNumber: line.lineNumber,
	ruleId: rule.id,
	category: rule.category,
	severity: rule.severity,
	title: rule.title,
	description: renderTemplate(rule.descriptionTemplate, captures),
	codeSnippet: codeSnippet(line.rawText),
	cweId: rule.cweId,
	explanation: rule.explanation,
	captures,
});
