// CHANGE: Tests for ordering, tallies, status and recommendations
// FORMAT THEOREM: key(issues[i]) ≤ key(issues[i+1]) where key = (line ↑, severity ↓, rule order ↑)
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { InvalidInputError } from "../../../src/core/errors.js";
import {
	failedReport,
	sortIssues,
	tallySeverities,
} from "../../../src/core/report/aggregate.js";
import {
	RECOMMENDATIONS,
	recommendations,
	reportStatus,
	scoreLabel,
} from "../../../src/core/report/summary.js";
import { defaultRegistry } from "../../../src/core/rules/registry.js";
import { issue } from "../../utils/builders.js";

describe("sortIssues", () => {
	it("orders by line, then severity, then catalog order", () => {
		const sorted = sortIssues(defaultRegistry(), [
			issue({ lineNumber: 3, ruleId: "quality-long-line" }),
			issue({ lineNumber: 1, ruleId: "type-hints-untyped-parameter" }),
			issue({ lineNumber: 1, ruleId: "type-hints-missing-return" }),
			issue({
				lineNumber: 1,
				ruleId: "sec-weak-hash",
				severity: "warning",
			}),
		]);
		expect(sorted.map((i) => i.ruleId)).toEqual([
			"sec-weak-hash",
			"type-hints-missing-return",
			"type-hints-untyped-parameter",
			"quality-long-line",
		]);
	});
});

describe("tallySeverities and reportStatus", () => {
	it("counts each severity once", () => {
		const tally = tallySeverities([
			issue({ severity: "critical" }),
			issue({ severity: "error" }),
			issue({ severity: "error" }),
			issue({ severity: "info" }),
		]);
		expect(tally).toEqual({ critical: 1, errors: 2, warnings: 0, info: 1 });
		expect(reportStatus(tally)).toBe("critical");
	});

	it("needs attention on errors and is good otherwise", () => {
		expect(reportStatus({ critical: 0, errors: 1, warnings: 0, info: 0 })).toBe(
			"needs-attention",
		);
		expect(reportStatus({ critical: 0, errors: 0, warnings: 4, info: 2 })).toBe(
			"good",
		);
	});
});

describe("recommendations", () => {
	it("names each group of categories present", () => {
		expect(
			recommendations([
				issue({ category: "dead_code" }),
				issue({ category: "security" }),
			]),
		).toEqual([RECOMMENDATIONS.security, RECOMMENDATIONS.other]);
	});

	it("says so when nothing was found", () => {
		expect(recommendations([])).toEqual([
			"Code quality is good, no action needed",
		]);
	});
});

describe("scoreLabel", () => {
	it("maps score bands to labels", () => {
		expect([100, 80, 79, 60, 40, 39].map(scoreLabel)).toEqual([
			"Excellent",
			"Excellent",
			"Good",
			"Good",
			"Needs Improvement",
			"Critical",
		]);
	});
});

describe("failedReport", () => {
	it("reports invalid input with neutral scores", () => {
		const report = failedReport(
			"empty.py",
			new InvalidInputError({ reason: "empty", detail: "Source text is empty" }),
		);
		expect(report.success).toBe(false);
		expect(report.status).toBe("failed");
		expect(report.issues).toEqual([]);
		expect(report.securityScore).toBe(100);
		expect(report.complexityMetrics).toEqual({
			cyclomaticComplexity: 1,
			maintainabilityIndex: 100,
		});
		expect(report.summary).toBe("Analysis failed: Source text is empty");
		expect(report.error).toBe("Source text is empty");
	});
});
