// CHANGE: Tests for rule registry construction and lookups
// FORMAT THEOREM: ∀r ∈ registry: orderOf(r.id) = index of r in its catalog
// INVARIANT: Duplicate ids are rejected; stateful regex flags are stripped

import { Either, Option } from "effect";
import { describe, expect, it } from "vitest";

import { DEFAULT_CATALOG } from "../../../src/core/rules/catalog/index.js";
import {
	defaultRegistry,
	makeRuleRegistry,
} from "../../../src/core/rules/registry.js";
import { CATEGORIES, pattern } from "../../../src/core/types/index.js";
import type { Rule } from "../../../src/core/types/index.js";

const rule = (id: string, regex: RegExp = /x/u): Rule => ({
	id,
	title: id,
	category: "quality",
	severity: "info",
	matcher: pattern(regex),
	cweId: null,
	descriptionTemplate: id,
	fixTemplate: null,
	explanation: null,
});

describe("makeRuleRegistry", () => {
	it("accepts the built-in catalog", () => {
		expect(Either.isRight(makeRuleRegistry(DEFAULT_CATALOG))).toBe(true);
	});

	it("rejects a catalog with a repeated id", () => {
		const result = makeRuleRegistry([rule("a"), rule("dup"), rule("dup")]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.detail).toBe("Duplicate rule id: dup");
		}
	});

	it("strips the global and sticky flags from patterns", () => {
		const result = makeRuleRegistry([rule("g", /x/giy)]);
		if (Either.isLeft(result)) throw new Error("registry rejected");
		const [only] = result.right.rules;
		expect(only?.matcher._tag === "Pattern" ? only.matcher.pattern.flags : "").toBe(
			"i",
		);
	});

	it("indexes rules by category, id and insertion order", () => {
		const result = makeRuleRegistry([rule("first"), rule("second")]);
		if (Either.isLeft(result)) throw new Error("registry rejected");
		const registry = result.right;
		expect(registry.rulesFor("quality").map((r) => r.id)).toEqual([
			"first",
			"second",
		]);
		expect(registry.rulesFor("security")).toEqual([]);
		expect(registry.allCategories()).toEqual(["quality"]);
		expect(registry.orderOf("second")).toBe(1);
		expect(Option.isNone(registry.ruleById("third"))).toBe(true);
	});
});

describe("defaultRegistry", () => {
	it("returns one shared frozen instance", () => {
		expect(defaultRegistry()).toBe(defaultRegistry());
		expect(Object.isFrozen(defaultRegistry().rules)).toBe(true);
	});

	it("covers every category", () => {
		expect(defaultRegistry().allCategories()).toEqual(CATEGORIES);
	});

	it("keeps catalog order as the tie-break order", () => {
		const registry = defaultRegistry();
		DEFAULT_CATALOG.forEach((r, index) => {
			expect(registry.orderOf(r.id)).toBe(index);
		});
	});

	it("gives every security rule a CWE id", () => {
		for (const r of defaultRegistry().rulesFor("security")) {
			expect(r.cweId).toMatch(/^CWE-\d+$/u);
		}
	});
});
