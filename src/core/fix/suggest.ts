// CHANGE: Deterministic fix suggestions rendered from rule templates
// WHY: The core never calls a model; issues without a template are marked delegable instead
// PURITY: CORE
// INVARIANT: For every issue returned by attachFixes: issue.delegable ↔ issue.suggestedFix = null
// COMPLEXITY: O(n) where n = |issues|

import { Option, pipe } from "effect";

import { renderTemplate } from "../rules/template.js";
import type { RuleRegistry } from "../rules/registry.js";
import type { Issue, RawIssue } from "../types/index.js";

/**
 * Renders the fix template of the issue's rule, if it has one.
 *
 * @pure true
 */
export const renderFix = (
	registry: RuleRegistry,
	raw: RawIssue,
): Option.Option<string> =>
	pipe(
		registry.ruleById(raw.ruleId),
		Option.flatMap((rule) => Option.fromNullable(rule.fixTemplate)),
		Option.map((template) => renderTemplate(template, raw.captures)),
	);

/**
 * Attaches fixes to raw issues.
 *
 * @pure true
 * @invariant Fields other than suggestedFix, fixSource and delegable are copied unchanged
 * @complexity O(n)
 */
export function attachFixes(
	registry: RuleRegistry,
	rawIssues: readonly RawIssue[],
): readonly Issue[] {
	return rawIssues.map((raw): Issue => {
		const fix = renderFix(registry, raw);
		const suggestedFix = Option.getOrNull(fix);
		return {
			lineNumber: raw.lineNumber,
			ruleId: raw.ruleId,
			category: raw.category,
			severity: raw.severity,
			title: raw.title,
			description: raw.description,
			codeSnippet: raw.codeSnippet,
			suggestedFix,
			fixSource: suggestedFix === null ? null : "rule",
			delegable: suggestedFix === null,
			cweId: raw.cweId,
			explanation: raw.explanation,
		};
	});
}
