// CHANGE: Severity scale and category enumeration for the analysis domain
// WHY: Every pass (scan, score, sort, exit decision) reads the same total order
// PURITY: CORE
// INVARIANT: rank(critical) > rank(error) > rank(warning) > rank(info)
// COMPLEXITY: O(1)

/**
 * Issue severity, totally ordered: critical > error > warning > info.
 */
export type Severity = "critical" | "error" | "warning" | "info";

/**
 * Threshold used by the exit-code decision. `none` never blocks.
 */
export type SeverityThreshold = Severity | "none";

/**
 * Rule categories known to the registry.
 */
export type Category =
	| "security"
	| "performance"
	| "quality"
	| "complexity"
	| "dead_code"
	| "type_hints"
	| "syntax";

export const SEVERITIES: readonly Severity[] = [
	"critical",
	"error",
	"warning",
	"info",
];

export const CATEGORIES: readonly Category[] = [
	"syntax",
	"security",
	"performance",
	"quality",
	"complexity",
	"dead_code",
	"type_hints",
];

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
	critical: 4,
	error: 3,
	warning: 2,
	info: 1,
};

/**
 * Numeric rank of a severity.
 *
 * @pure true
 * @invariant result ∈ {1, 2, 3, 4}
 */
export function severityRank(severity: Severity): number {
	return SEVERITY_RANK[severity];
}

/**
 * Comparator that puts the more severe value first.
 *
 * @pure true
 * @invariant compareSeverityDesc(a, b) = -compareSeverityDesc(b, a)
 */
export function compareSeverityDesc(a: Severity, b: Severity): number {
	return SEVERITY_RANK[b] - SEVERITY_RANK[a];
}

/**
 * True when `severity` is at or above `threshold`.
 *
 * @pure true
 * @invariant threshold = "none" → false
 */
export function severityMeetsThreshold(
	severity: Severity,
	threshold: SeverityThreshold,
): boolean {
	if (threshold === "none") return false;
	return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export function isSeverity(value: string): value is Severity {
	return SEVERITIES.some((severity) => severity === value);
}

export function isSeverityThreshold(value: string): value is SeverityThreshold {
	return value === "none" || isSeverity(value);
}

export function isCategory(value: string): value is Category {
	return CATEGORIES.some((category) => category === value);
}
