// CHANGE: Cyclomatic complexity, maintainability index and line metrics from LineContexts
// WHY: Metrics never re-read the text; they use the same facts the rules see
// FORMAT THEOREM: CC = 1 + |branch headers| + Σ booleanOperators
// PURITY: CORE
// INVARIANT: CC ≥ 1; 0 ≤ MI ≤ 100
// COMPLEXITY: O(n) where n = total characters of code text

import type {
	ComplexityMetrics,
	LineContext,
	LineMetrics,
} from "../types/index.js";

const BRANCH_TAGS = ["conditional", "loop", "exception-handler"] as const;

const TOKEN = /[A-Za-z_][A-Za-z0-9_]*|\d+(?:\.\d+)?|[^\sA-Za-z0-9_]/gu;

export const DEFAULT_COMPLEXITY: ComplexityMetrics = {
	cyclomaticComplexity: 1,
	maintainabilityIndex: 100,
};

/**
 * @pure true
 * @invariant result ≥ 1
 */
export function cyclomaticComplexity(lines: readonly LineContext[]): number {
	return lines.reduce(
		(total, line) =>
			total +
			BRANCH_TAGS.filter((tag) => line.constructs.has(tag)).length +
			line.booleanOperators,
		1,
	);
}

/**
 * Counts blank, comment-only and code lines.
 *
 * @pure true
 * @invariant totalLines = codeLines + commentLines + blankLines
 */
export function lineMetrics(lines: readonly LineContext[]): LineMetrics {
	const blankLines = lines.filter((line) => line.constructs.has("blank")).length;
	const commentLines = lines.filter((line) =>
		line.constructs.has("comment"),
	).length;
	const codeLines = lines.length - blankLines - commentLines;
	const counted = codeLines + commentLines;
	return {
		totalLines: lines.length,
		codeLines,
		commentLines,
		blankLines,
		commentRatio: counted === 0 ? 0 : commentLines / counted,
	};
}

/**
 * Halstead volume proxy N·log2(n) over tokens of the masked code.
 *
 * @pure true
 * @invariant result = 1 when fewer than two distinct tokens exist
 */
export function halsteadVolume(lines: readonly LineContext[]): number {
	const tokens = lines.flatMap((line) => line.codeText.match(TOKEN) ?? []);
	const distinct = new Set(tokens).size;
	return distinct < 2 ? 1 : tokens.length * Math.log2(distinct);
}

const roundTo2 = (value: number): number => Math.round(value * 100) / 100;

/**
 * Maintainability index normalised to [0, 100], rounded to two decimals.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * // "x = 1": V = 3·log2(3), CC = 1, LOC = 1, cm = 0
 * maintainabilityIndex(lines, 1) // => 95.12
 * ```
 */
export function maintainabilityIndex(
	lines: readonly LineContext[],
	cyclomatic: number,
): number {
	const metrics = lineMetrics(lines);
	const volume = halsteadVolume(lines);
	const loc = Math.max(1, metrics.codeLines);
	const raw =
		171 -
		5.2 * Math.log(volume) -
		0.23 * cyclomatic -
		16.2 * Math.log(loc) +
		50 * Math.sin(Math.sqrt(2.4 * metrics.commentRatio));
	return roundTo2(Math.min(100, Math.max(0, (raw * 100) / 171)));
}

/**
 * @pure true
 */
export function complexityMetrics(
	lines: readonly LineContext[],
): ComplexityMetrics {
	const cyclomatic = cyclomaticComplexity(lines);
	return {
		cyclomaticComplexity: cyclomatic,
		maintainabilityIndex: maintainabilityIndex(lines, cyclomatic),
	};
}
