// CHANGE: Category scanner with a per-(rule, line) fault barrier
// WHY: One broken rule must not abort a scan; its fault is recorded and the scan moves on
// FORMAT THEOREM: ∀c ∉ options.enabledCategories: ∀i ∈ scanAll(...).issues: i.category ≠ c
// PURITY: CORE (scanAll returns an Effect description; logging happens when it runs)
// EFFECT: Effect<ScanResult, never>
// INVARIANT: Same registry, lines and options → identical issues and faults
// COMPLEXITY: O(r·n) where r = enabled rules, n = lines

import { Effect, Either, Option } from "effect";

import { RuleEvaluationFault } from "../errors.js";
import type { RuleRegistry } from "../rules/registry.js";
import type {
	AnalysisOptions,
	Category,
	LineContext,
	RawIssue,
	RuleFaultRecord,
} from "../types/index.js";
import { evaluateRule, toRawIssue } from "./evaluate.js";

export interface ScanResult {
	readonly issues: readonly RawIssue[];
	readonly faults: readonly RuleFaultRecord[];
}

/**
 * Evaluates every rule of one category on every line.
 *
 * @pure true
 * @invariant A throwing rule yields a fault for that (rule, line) and no issue
 * @complexity O(r·n)
 */
export function scanCategory(
	registry: RuleRegistry,
	lines: readonly LineContext[],
	category: Category,
): ScanResult {
	const issues: RawIssue[] = [];
	const faults: RuleFaultRecord[] = [];
	const rules = registry.rulesFor(category);
	for (const line of lines) {
		for (const rule of rules) {
			const outcome = Either.try({
				try: () => evaluateRule(rule, line),
				catch: (cause) =>
					new RuleEvaluationFault({
						ruleId: rule.id,
						lineNumber: line.lineNumber,
						detail: cause instanceof Error ? cause.message : String(cause),
					}),
			});
			Either.match(outcome, {
				onLeft: (fault) => {
					faults.push({
						ruleId: fault.ruleId,
						lineNumber: fault.lineNumber,
						detail: fault.detail,
					});
				},
				onRight: (captures) => {
					if (Option.isSome(captures)) {
						issues.push(toRawIssue(rule, line, captures.value));
					}
				},
			});
		}
	}
	return { issues, faults };
}

const scanCategoryEffect = (
	registry: RuleRegistry,
	lines: readonly LineContext[],
	category: Category,
): Effect.Effect<ScanResult> =>
	Effect.gen(function* () {
		const result = scanCategory(registry, lines, category);
		for (const fault of result.faults) {
			yield* Effect.logWarning(
				`Rule ${fault.ruleId} failed on line ${fault.lineNumber}: ${fault.detail}`,
			);
		}
		yield* Effect.logDebug(
			`Scanned ${category}: ${result.issues.length} issue(s)`,
		);
		return result;
	}).pipe(Effect.withLogSpan(`scan.${category}`));

/**
 * Scans all enabled categories that exist in the registry.
 * Disabled categories are never evaluated.
 *
 * @effect Effect<ScanResult, never>
 * @invariant issues are concatenated in registry category order
 * @complexity O(r·n)
 */
export function scanAll(
	registry: RuleRegistry,
	lines: readonly LineContext[],
	options: AnalysisOptions,
): Effect.Effect<ScanResult> {
	const categories = registry
		.allCategories()
		.filter((category) => options.enabledCategories.has(category));
	return Effect.forEach(categories, (category) =>
		scanCategoryEffect(registry, lines, category),
	).pipe(
		Effect.map((results) => ({
			issues: results.flatMap((result) => result.issues),
			faults: results.flatMap((result) => result.faults),
		})),
	);
}
