// CHANGE: Tests for category scores and complexity metrics
// FORMAT THEOREM: score(c) = clamp(100 − Σ weight(i.severity), 0, 100)
// INVARIANT: Adding an issue of category c never raises score(c)

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	complexityMetrics,
	cyclomaticComplexity,
	lineMetrics,
	maintainabilityIndex,
} from "../../../src/core/scoring/complexity.js";
import { categoryScore } from "../../../src/core/scoring/scores.js";
import { CATEGORIES, SEVERITIES } from "../../../src/core/types/index.js";
import { linesOf } from "../../utils/builders.js";

const scoredIssueArb = fc.record({
	category: fc.constantFrom(...CATEGORIES),
	severity: fc.constantFrom(...SEVERITIES),
});

describe("categoryScore", () => {
	it("subtracts severity weights of the category only", () => {
		const score = categoryScore(
			[
				{ category: "security", severity: "critical" },
				{ category: "security", severity: "warning" },
				{ category: "performance", severity: "critical" },
			],
			"security",
		);
		expect(score).toEqual({
			category: "security",
			score: 70,
			penalty: 30,
			clamped: false,
		});
	});

	it("clamps at zero and says so", () => {
		const issues = Array.from({ length: 5 }, () => ({
			category: "security" as const,
			severity: "critical" as const,
		}));
		expect(categoryScore(issues, "security")).toEqual({
			category: "security",
			score: 0,
			penalty: 125,
			clamped: true,
		});
	});

	it("stays within [0, 100]", () => {
		fc.assert(
			fc.property(fc.array(scoredIssueArb), fc.constantFrom(...CATEGORIES), (issues, category) => {
				const { score } = categoryScore(issues, category);
				expect(score).toBeGreaterThanOrEqual(0);
				expect(score).toBeLessThanOrEqual(100);
			}),
		);
	});

	it("never rises when an issue of the category is added", () => {
		fc.assert(
			fc.property(fc.array(scoredIssueArb), scoredIssueArb, (issues, extra) => {
				const before = categoryScore(issues, extra.category).score;
				const after = categoryScore([...issues, extra], extra.category).score;
				expect(after).toBeLessThanOrEqual(before);
			}),
		);
	});
});

describe("complexityMetrics", () => {
	it("scores a single assignment", () => {
		expect(complexityMetrics(linesOf("x = 1"))).toEqual({
			cyclomaticComplexity: 1,
			maintainabilityIndex: 95.12,
		});
	});

	it("counts branch headers and boolean operators but not else", () => {
		const text = [
			"if a and b:",
			"    pass",
			"elif c:",
			"    pass",
			"else:",
			"    pass",
			"try:",
			"    run()",
			"except ValueError:",
			"    pass",
		].join("\n");
		expect(cyclomaticComplexity(linesOf(text))).toBe(5);
	});

	it("keeps the maintainability index within [0, 100]", () => {
		fc.assert(
			fc.property(fc.string(), (text) => {
				const { maintainabilityIndex, cyclomaticComplexity: cc } =
					complexityMetrics(linesOf(text));
				expect(maintainabilityIndex).toBeGreaterThanOrEqual(0);
				expect(maintainabilityIndex).toBeLessThanOrEqual(100);
				expect(cc).toBeGreaterThanOrEqual(1);
			}),
		);
	});
});

// Twenty or more code lines keep the index well below the 100 clamp
const codeBodyArb = fc
	.array(
		fc.constantFrom(
			"x = y + 1",
			"total = total * rate",
			"if a and b:",
			"run(a, b)",
		),
		{ minLength: 20, maxLength: 40 },
	)
	.map((lines) => lines.join("\n"));

describe("maintainabilityIndex", () => {
	it("never rises when cyclomatic complexity grows", () => {
		fc.assert(
			fc.property(
				codeBodyArb,
				fc.integer({ min: 1, max: 200 }),
				fc.integer({ min: 1, max: 200 }),
				(text, cc, extra) => {
					const lines = linesOf(text);
					const base = maintainabilityIndex(lines, cc);
					expect(base).toBeLessThan(100);
					expect(maintainabilityIndex(lines, cc + extra)).toBeLessThanOrEqual(
						base,
					);
				},
			),
		);
	});

	it("never falls when comment lines are added to the same code", () => {
		fc.assert(
			fc.property(
				codeBodyArb,
				fc.integer({ min: 1, max: 30 }),
				fc.integer({ min: 1, max: 50 }),
				(text, comments, cc) => {
					const base = maintainabilityIndex(linesOf(text), cc);
					const commented = `${text}\n${Array.from({ length: comments }, () => "# note").join("\n")}`;
					expect(base).toBeLessThan(100);
					expect(
						maintainabilityIndex(linesOf(commented), cc),
					).toBeGreaterThanOrEqual(base);
				},
			),
		);
	});
});

describe("lineMetrics", () => {
	it("splits lines into code, comment and blank", () => {
		expect(lineMetrics(linesOf("# c\n\nx = 1"))).toEqual({
			totalLines: 3,
			codeLines: 1,
			commentLines: 1,
			blankLines: 1,
			commentRatio: 0.5,
		});
	});
});
