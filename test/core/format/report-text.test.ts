// CHANGE: Tests for text and JSON rendering of outcomes
// INVARIANT: json output parses back to the wire format

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { analyzeSource } from "../../../src/app/analyze.js";
import { analyzeBatchEffect } from "../../../src/app/batch.js";
import {
	outcomeReports,
	renderOutcome,
	renderReportPretty,
} from "../../../src/core/format/report-text.js";
import { compareReports } from "../../../src/core/report/compare.js";
import { DEFAULT_WIRE_OPTIONS } from "../../../src/core/wire/request.js";
import { only } from "../../utils/builders.js";

const credentialReport = () =>
	analyzeSource('password = "admin123"', only("security"));

describe("renderReportPretty", () => {
	it("prints header, issue block and recommendations", () => {
		const lines = renderReportPretty(credentialReport()).split("\n");
		expect(lines[0]).toBe("<input>: critical");
		expect(lines).toContain("  Issues: 1 (critical 1, error 0, warning 0, info 0)");
		expect(lines).toContain("  Security score: 75/100 (Good)");
		expect(lines).toContain("  Performance score: 100/100 (Excellent)");
		expect(lines).toContain("  1  critical  sec-hardcoded-credential [CWE-798]");
		expect(lines).toContain('      fix: password = os.environ["PASSWORD"]');
		expect(lines).toContain("  - Fix security vulnerabilities immediately");
		expect(lines.at(-1)).toBe("Found 1 issues. Security score: 75/100");
	});

	it("prints only the failure for rejected input", () => {
		expect(renderReportPretty(analyzeSource("", only("security")))).toBe(
			"<input>: failed\n  Analysis failed: Source text is empty",
		);
	});
});

describe("renderOutcome", () => {
	it("renders reports as wire JSON", () => {
		const text = renderOutcome(
			{ _tag: "Report", report: credentialReport() },
			"json",
		);
		expect(JSON.parse(text)).toMatchObject({
			success: true,
			file_name: null,
			total_issues: 1,
			security_score: 75,
			status: "critical",
		});
	});

	it("summarises batches line by line", () => {
		const batch = Effect.runSync(
			analyzeBatchEffect({
				codes: [
					{ code: "x = 1", file_name: "ok.py" },
					{ code: " ", file_name: "blank.py" },
				],
				options: { ...DEFAULT_WIRE_OPTIONS, dead_code: false },
			}),
		);
		expect(renderOutcome({ _tag: "Batch", batch }, "pretty")).toBe(
			[
				"Processed 2 files: 1 analysed, 1 failed",
				"  [0] ok.py: 0 issues, security 100/100, performance 100/100",
				"  [1] blank.py: failed (Source text is empty)",
			].join("\n"),
		);
	});

	it("decides comparisons on the after report only", () => {
		const before = credentialReport();
		const after = analyzeSource("x = 1", only("security"));
		expect(
			outcomeReports({ _tag: "Comparison", comparison: compareReports(before, after) }),
		).toEqual([after]);
	});
});
