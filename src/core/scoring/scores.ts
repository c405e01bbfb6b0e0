// CHANGE: Category scores from severity-weighted penalties
// FORMAT THEOREM: score(c) = clamp(100 − Σ_{i: i.category = c} weight(i.severity), 0, 100)
// PURITY: CORE
// INVARIANT: 0 ≤ score ≤ 100; adding an issue of category c never raises score(c)
// COMPLEXITY: O(n) where n = |issues|

import type { Category, Severity } from "../types/index.js";

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
	critical: 25,
	error: 15,
	warning: 5,
	info: 1,
};

export const MAX_SCORE = 100;

/**
 * @property penalty Unclamped sum of weights
 * @property clamped True when the penalty exceeded MAX_SCORE and the score was clamped to 0
 */
export interface CategoryScore {
	readonly category: Category;
	readonly score: number;
	readonly penalty: number;
	readonly clamped: boolean;
}

/**
 * Scores one category.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * categoryScore([{ category: "security", severity: "critical" }], "security").score
 * // => 75
 * ```
 */
export function categoryScore(
	issues: ReadonlyArray<{ readonly category: Category; readonly severity: Severity }>,
	category: Category,
): CategoryScore {
	const penalty = issues
		.filter((issue) => issue.category === category)
		.reduce((sum, issue) => sum + SEVERITY_WEIGHTS[issue.severity], 0);
	const raw = MAX_SCORE - penalty;
	return {
		category,
		score: Math.min(MAX_SCORE, Math.max(0, raw)),
		penalty,
		clamped: raw < 0,
	};
}
