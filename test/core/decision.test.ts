// CHANGE: Tests for the exit-code decision
// FORMAT THEOREM: ∀s: (s.invalidInput ∨ s.hasBlockingIssues) ↔ computeExitCode(s) = 1
// PURITY: CORE

import { describe, expect, it } from "vitest";

import { analyzeSource } from "../../src/app/analyze.js";
import {
	computeExitCode,
	deriveDecisionState,
} from "../../src/core/decision.js";
import { severityMeetsThreshold } from "../../src/core/types/index.js";
import { ALL, only } from "../utils/builders.js";

describe("computeExitCode", () => {
	it("exits 1 on invalid input or blocking issues", () => {
		expect(computeExitCode({ invalidInput: false, hasBlockingIssues: false })).toBe(0);
		expect(computeExitCode({ invalidInput: true, hasBlockingIssues: false })).toBe(1);
		expect(computeExitCode({ invalidInput: false, hasBlockingIssues: true })).toBe(1);
	});
});

describe("deriveDecisionState", () => {
	const critical = analyzeSource('password = "admin123"', only("security"));

	it("blocks on issues at or above the threshold", () => {
		expect(deriveDecisionState([critical], "critical")).toEqual({
			invalidInput: false,
			hasBlockingIssues: true,
		});
		expect(deriveDecisionState([critical], "info").hasBlockingIssues).toBe(true);
	});

	it("never blocks with threshold none", () => {
		expect(deriveDecisionState([critical], "none").hasBlockingIssues).toBe(false);
	});

	it("treats a failed analysis as invalid input", () => {
		expect(deriveDecisionState([analyzeSource("", ALL)], "none")).toEqual({
			invalidInput: true,
			hasBlockingIssues: false,
		});
	});
});

describe("severityMeetsThreshold", () => {
	it("follows critical > error > warning > info", () => {
		expect(severityMeetsThreshold("error", "warning")).toBe(true);
		expect(severityMeetsThreshold("warning", "error")).toBe(false);
		expect(severityMeetsThreshold("info", "info")).toBe(true);
	});
});
