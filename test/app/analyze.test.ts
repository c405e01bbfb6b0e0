// CHANGE: End-to-end tests for the analysis pipeline, one category at a time
// WHY: Each case pins the issues a short program produces with exactly one category enabled
// FORMAT THEOREM: ∀text, options: analyzeSource(text, options) = analyzeSource(text, options)
// PURITY: APP (runs the pipeline synchronously)
// INVARIANT: 1 ≤ issue.lineNumber ≤ physical line count

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { analyzeRequest, analyzeSource } from "../../src/app/analyze.js";
import type { Category } from "../../src/core/types/index.js";
import { DEFAULT_WIRE_OPTIONS } from "../../src/core/wire/request.js";
import { ALL, only } from "../utils/builders.js";

const found = (text: string, ...categories: readonly Category[]) =>
	analyzeSource(text, only(...categories)).issues.map((i) => [
		i.lineNumber,
		i.ruleId,
	]);

describe("analyzeSource: reference scenarios", () => {
	it("finds exactly one hardcoded credential", () => {
		const report = analyzeSource('password = "admin123"', only("security"));
		expect(report.success).toBe(true);
		expect(report.issues).toHaveLength(1);
		expect(report.issues[0]?.severity).toBe("critical");
		expect(report.issues[0]?.cweId).toBe("CWE-798");
		expect(report.securityScore).toBe(75);
		expect(report.status).toBe("critical");
		expect(report.summary).toBe("Found 1 issues. Security score: 75/100");
		expect(report.recommendations).toEqual([
			"Fix security vulnerabilities immediately",
		]);
	});

	it("leaves security untouched when only performance runs", () => {
		const report = analyzeSource(
			"def divide(a, b):\n    return a / b",
			only("performance"),
		);
		expect(report.securityScore).toBe(100);
		expect(report.performanceScore).toBe(100);
		expect(report.issues.filter((i) => i.category === "security")).toEqual([]);
	});

	it("rejects empty input", () => {
		const report = analyzeSource("", ALL);
		expect(report.success).toBe(false);
		expect(report.issues).toEqual([]);
		expect(report.error).toBe("Source text is empty");
	});

	it("rejects whitespace-only and binary input", () => {
		expect(analyzeSource("  \n\t\n", ALL).success).toBe(false);
		expect(analyzeSource("x = 1\u0000", ALL).error).toBe(
			"Source text contains NUL bytes and looks binary",
		);
	});
});

describe("analyzeSource: security", () => {
	it("flags SQL built by concatenation without a deterministic fix", () => {
		const report = analyzeSource(
			'cursor.execute("SELECT * FROM users WHERE id = " + user_id)',
			only("security"),
		);
		expect(report.issues.map((i) => [i.ruleId, i.cweId, i.delegable])).toEqual([
			["sec-sql-injection", "CWE-89", true],
		]);
		expect(report.issues[0]?.suggestedFix).toBeNull();
	});

	it("finds credentials in annotated assignments and dict literals", () => {
		const annotated = analyzeSource('password: str = "admin123"', only("security"));
		expect(annotated.issues.map((i) => [i.ruleId, i.description])).toEqual([
			["sec-hardcoded-credential", "Hardcoded credential assigned to 'password'"],
		]);
		expect(found('config = {"api_key": "abc123"}', "security")).toEqual([
			[1, "sec-hardcoded-credential"],
		]);
	});

	it("names the function used for dynamic execution", () => {
		const report = analyzeSource("result = eval(user_input)", only("security"));
		expect(report.issues[0]?.description).toBe(
			"Dynamic code execution with eval()",
		);
	});

	it("names a weak hash in lower case", () => {
		const report = analyzeSource(
			"digest = hashlib.MD5(data).hexdigest()",
			only("security"),
		);
		expect(report.issues.map((i) => i.description)).toEqual([
			"Weak hash algorithm md5",
		]);
		expect(report.securityScore).toBe(95);
	});
});

describe("analyzeSource: performance", () => {
	it("flags string accumulation inside a loop", () => {
		const text = 'result = ""\nfor item in items:\n    result += "x"';
		expect(found(text, "performance")).toEqual([
			[3, "perf-string-concat-in-loop"],
		]);
		expect(analyzeSource(text, only("performance")).performanceScore).toBe(95);
	});

	it("flags a loop nested in another loop", () => {
		const text = "for a in xs:\n    for b in ys:\n        print(a, b)";
		expect(found(text, "performance")).toEqual([[2, "perf-nested-loop"]]);
	});

	it("suggests enumerate for range(len(...))", () => {
		const report = analyzeSource(
			"for i in range(len(items)):\n    print(items[i])",
			only("performance"),
		);
		expect(report.issues.map((i) => [i.description, i.suggestedFix])).toEqual([
			[
				"Iterating over range(len(items)) instead of the sequence",
				"for i, item in enumerate(items):",
			],
		]);
	});
});

describe("analyzeSource: quality", () => {
	it("replaces a bare except", () => {
		const report = analyzeSource(
			"try:\n    run()\nexcept:\n    pass",
			only("quality"),
		);
		expect(report.issues.map((i) => [i.lineNumber, i.suggestedFix])).toEqual([
			[3, "except Exception:"],
		]);
	});

	it("reports marker comments by name", () => {
		const report = analyzeSource("x = 1  # TODO: remove", only("quality"));
		expect(report.issues.map((i) => i.description)).toEqual([
			"TODO comment left in code",
		]);
	});

	it("reports mutable default arguments", () => {
		const report = analyzeSource(
			"def add(item, bucket=[]):\n    bucket.append(item)",
			only("quality"),
		);
		expect(report.issues.map((i) => [i.description, i.suggestedFix])).toEqual([
			[
				"Mutable default value [] for parameter 'bucket'",
				"bucket=None, then create the value inside the function",
			],
		]);
	});
});

describe("analyzeSource: complexity, dead code, type hints, syntax", () => {
	it("flags a condition with many boolean operators", () => {
		const report = analyzeSource("if a and b or c and d:\n    pass", only("complexity"));
		expect(report.issues.map((i) => i.ruleId)).toEqual([
			"complexity-complex-condition",
		]);
		expect(report.complexityMetrics.cyclomaticComplexity).toBe(5);
	});

	it("flags control flow four levels deep", () => {
		const text = [
			"for a in xs:",
			"    for b in ys:",
			"        for c in zs:",
			"            for d in ws:",
			"                if a:",
			"                    pass",
		].join("\n");
		expect(found(text, "complexity")).toEqual([[5, "complexity-deep-nesting"]]);
	});

	it("flags long parameter lists", () => {
		expect(
			found("def f(a, b, c, d, e, g):\n    return a", "complexity"),
		).toEqual([[1, "complexity-long-parameter-list"]]);
	});

	it("reports unreachable and unused code after return", () => {
		const text = "def f():\n    return 1\n    x = 2\nprint(f())";
		expect(found(text, "dead_code")).toEqual([
			[3, "dead-code-unreachable"],
			[3, "dead-code-unused-binding"],
		]);
	});

	it("treats a name formatted into an f-string as used", () => {
		expect(found('name = "a"\nprint(f"hi {name}")', "dead_code")).toEqual([]);
	});

	it("reports missing annotations on unannotated functions only", () => {
		const report = analyzeSource("def greet(name):\n    return name", only("type_hints"));
		expect(report.issues.map((i) => [i.ruleId, i.suggestedFix])).toEqual([
			["type-hints-missing-return", "def greet(name) -> Any:"],
			["type-hints-untyped-parameter", null],
		]);
		expect(
			found("def greet(name: str) -> str:\n    return name", "type_hints"),
		).toEqual([]);
	});

	it("suggests the missing colon", () => {
		const report = analyzeSource("if x > 1\n    pass", only("syntax"));
		expect(report.issues.map((i) => [i.ruleId, i.suggestedFix])).toEqual([
			["syntax-missing-colon", "if x > 1:"],
		]);
		expect(report.status).toBe("needs-attention");
	});

	it("reports unterminated strings and unclosed brackets", () => {
		expect(found('name = "abc', "syntax")).toEqual([
			[1, "syntax-unterminated-string"],
		]);
		expect(found("items = [1, 2", "syntax")).toEqual([
			[1, "syntax-unclosed-bracket"],
		]);
	});
});

describe("analyzeSource: properties", () => {
	const sourceArb = fc
		.array(
			fc.constantFrom(
				'token = "abc"',
				"for i in range(len(xs)):",
				"    if a and b or c or d:",
				"        return 1",
				"        x = 2",
				"except:",
				"",
				"# import os",
				"def f(a, b=[]):",
			),
			{ minLength: 1, maxLength: 20 },
		)
		.map((parts) => parts.join("\n"));

	it("reports issues on existing lines only", () => {
		fc.assert(
			fc.property(sourceArb, (text) => {
				const lineCount = text.split("\n").length;
				for (const i of analyzeSource(text, ALL).issues) {
					expect(i.lineNumber).toBeGreaterThanOrEqual(1);
					expect(i.lineNumber).toBeLessThanOrEqual(lineCount);
				}
			}),
		);
	});

	it("keeps totals consistent with the issue list", () => {
		fc.assert(
			fc.property(sourceArb, (text) => {
				const report = analyzeSource(text, ALL);
				expect(report.totalIssues).toBe(report.issues.length);
				expect(report.critical + report.errors + report.warnings + report.info).toBe(
					report.totalIssues,
				);
			}),
		);
	});

	it("produces identical reports for identical input", () => {
		fc.assert(
			fc.property(sourceArb, (text) => {
				expect(analyzeSource(text, ALL)).toEqual(analyzeSource(text, ALL));
			}),
		);
	});

	it("never raises the security score when a credential line is added", () => {
		fc.assert(
			fc.property(sourceArb, (text) => {
				const before = analyzeSource(text, ALL).securityScore;
				const after = analyzeSource(`${text}\napi_key = "test-secret"`, ALL)
					.securityScore;
				expect(after).toBeLessThanOrEqual(before);
			}),
		);
	});
});

describe("analyzeRequest", () => {
	it("answers in the wire format with the request's options", () => {
		const wire = analyzeRequest({
			code: 'password = "admin123"',
			file_name: "app.py",
			options: { ...DEFAULT_WIRE_OPTIONS, dead_code: false },
		});
		expect(wire.file_name).toBe("app.py");
		expect(wire.issues.map((i) => [i.rule_id, i.cwe_id])).toEqual([
			["sec-hardcoded-credential", "CWE-798"],
		]);
	});

	it("reports empty code as a failed analysis", () => {
		const wire = analyzeRequest({
			code: "",
			file_name: null,
			options: DEFAULT_WIRE_OPTIONS,
		});
		expect(wire.success).toBe(false);
		expect(wire.status).toBe("failed");
		expect(wire.summary).toBe("Analysis failed: Source text is empty");
	});
});
