// CHANGE: Immutable rule registry indexed by category and id
// WHY: Scanner receives the registry by handle, so tests can swap in stand-in catalogs
// FORMAT THEOREM: ∀r ∈ registry: orderOf(r.id) = index of r in the catalog it was built from
// PURITY: CORE
// INVARIANT: Rule ids are unique; no rule pattern carries the stateful g or y flags
// COMPLEXITY: O(n) construction, O(1) lookups

import { Either, Option } from "effect";

import { RegistryError } from "../errors.js";
import { CATEGORIES } from "../types/index.js";
import type { Category, Matcher, Rule } from "../types/index.js";
import { DEFAULT_CATALOG } from "./catalog/index.js";

/**
 * Read-only view over a validated rule catalog.
 */
export interface RuleRegistry {
	readonly rules: readonly Rule[];
	readonly rulesFor: (category: Category) => readonly Rule[];
	readonly allCategories: () => readonly Category[];
	readonly ruleById: (id: string) => Option.Option<Rule>;
	readonly orderOf: (id: string) => number;
}

const statelessMatcher = (matcher: Matcher): Matcher =>
	matcher._tag === "Pattern"
		? {
				_tag: "Pattern",
				pattern: new RegExp(
					matcher.pattern.source,
					matcher.pattern.flags.replace(/[gy]/gu, ""),
				),
			}
		: matcher;

function freezeRegistry(catalog: readonly Rule[]): RuleRegistry {
	const rules = Object.freeze(
		catalog.map((rule) =>
			Object.freeze({ ...rule, matcher: statelessMatcher(rule.matcher) }),
		),
	);
	const byId = new Map(rules.map((rule, index) => [rule.id, { rule, index }]));
	const byCategory = new Map<Category, readonly Rule[]>(
		CATEGORIES.map((category) => [
			category,
			Object.freeze(rules.filter((rule) => rule.category === category)),
		]),
	);
	const present = Object.freeze(
		CATEGORIES.filter((category) => (byCategory.get(category) ?? []).length > 0),
	);
	return Object.freeze({
		rules,
		rulesFor: (category: Category) => byCategory.get(category) ?? [],
		allCategories: () => present,
		ruleById: (id: string) =>
			Option.map(Option.fromNullable(byId.get(id)), (entry) => entry.rule),
		orderOf: (id: string) => byId.get(id)?.index ?? Number.MAX_SAFE_INTEGER,
	});
}

/**
 * Validates a catalog and builds a registry over it.
 *
 * @param catalog - Rules in insertion order
 * @returns Right(registry), or Left(RegistryError) naming the first duplicated id
 *
 * @pure true
 * @invariant Right(r) → ∀i≠j: r.rules[i].id ≠ r.rules[j].id
 * @complexity O(n)
 */
export function makeRuleRegistry(
	catalog: readonly Rule[],
): Either.Either<RuleRegistry, RegistryError> {
	const seen = new Set<string>();
	const duplicate = catalog.find((rule) => {
		const repeated = seen.has(rule.id);
		seen.add(rule.id);
		return repeated;
	});
	return duplicate === undefined
		? Either.right(freezeRegistry(catalog))
		: Either.left(
				new RegistryError({ detail: `Duplicate rule id: ${duplicate.id}` }),
			);
}

let defaultInstance: RuleRegistry | undefined;

/**
 * Process-wide registry over the built-in catalog, built on first use.
 *
 * @invariant Returns the same frozen instance on every call
 */
export function defaultRegistry(): RuleRegistry {
	defaultInstance ??= freezeRegistry(DEFAULT_CATALOG);
	return defaultInstance;
}
