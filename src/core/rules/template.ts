// CHANGE: Placeholder templates for issue descriptions and deterministic fixes
// WHY: Rules stay plain data; only captures vary between matches
// PURITY: CORE
// INVARIANT: render(t, c) is deterministic; unknown named placeholders are left as written
// COMPLEXITY: O(|template| + Σ|substituted values|)

import { match, P } from "ts-pattern";

import type { MatchCaptures } from "../types/index.js";

const PLACEHOLDER = /\{(?<key>\w+)(?<filters>(?:\|[a-z]+)*)\}/gu;

type Filter = "upper" | "lower" | "trim";

const isFilter = (name: string): name is Filter =>
	name === "upper" || name === "lower" || name === "trim";

const applyFilter = (value: string, filter: Filter): string =>
	match(filter)
		.with("upper", () => value.toUpperCase())
		.with("lower", () => value.toLowerCase())
		.with("trim", () => value.trim())
		.exhaustive();

function lookup(key: string, captures: MatchCaptures): string | null {
	return match(key)
		.with(P.string.regex(/^\d+$/u), (n) => captures.groups[Number(n)] ?? "")
		.with("line", () => captures.line)
		.otherwise((name) => captures.named[name] ?? null);
}

/**
 * Renders `{0}`, `{n}`, `{name}` and `{line}` placeholders with optional
 * `|upper`, `|lower` and `|trim` filters.
 *
 * @param template - Template text
 * @param captures - Values captured by the rule's matcher
 * @returns Rendered text; positional groups that did not participate render as ""
 *
 * @pure true
 * @complexity O(|template|)
 *
 * @example
 * ```ts
 * renderTemplate("{1} = os.environ[\"{1|upper}\"]", {
 *   groups: ["api_key = \"x\"", "api_key"], named: {}, line: "api_key = \"x\"",
 * });
 * // => 'api_key = os.environ["API_KEY"]'
 * ```
 */
export function renderTemplate(
	template: string,
	captures: MatchCaptures,
): string {
	return template.replace(
		PLACEHOLDER,
		(whole: string, key: string, filters: string) => {
			const value = lookup(key, captures);
			if (value === null) return whole;
			return filters
				.split("|")
				.filter(isFilter)
				.reduce(applyFilter, value);
		},
	);
}

/**
 * Captures for a structural match: no groups, only the trimmed line.
 *
 * @pure true
 */
export const lineCaptures = (rawText: string): MatchCaptures => ({
	groups: [rawText.trim()],
	named: {},
	line: rawText.trim(),
});

/**
 * Captures from a regex match against a raw line.
 *
 * @pure true
 */
export const regexCaptures = (
	found: RegExpExecArray,
	rawText: string,
): MatchCaptures => ({
	groups: Array.from(found, (group) => group ?? ""),
	named: { ...found.groups },
	line: rawText.trim(),
});
