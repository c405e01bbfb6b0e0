// CHANGE: Tests for fix-model delegation, batch analysis and comparisons
// PURITY: APP
// INVARIANT: A failing fix model or one bad batch entry never fails the whole operation

import { Effect, Either, Logger, LogLevel } from "effect";
import { describe, expect, it } from "vitest";

import { analyzeSource } from "../../src/app/analyze.js";
import { analyzeBatchEffect } from "../../src/app/batch.js";
import { compareSources } from "../../src/app/compare.js";
import { applyFixModel } from "../../src/app/fix-model.js";
import { FixModelError } from "../../src/core/errors.js";
import type { FixModel } from "../../src/core/fix/model.js";
import { DEFAULT_WIRE_OPTIONS } from "../../src/core/wire/request.js";
import { only } from "../utils/builders.js";

const silent = <A, E>(effect: Effect.Effect<A, E>): Effect.Effect<A, E> =>
	effect.pipe(Logger.withMinimumLogLevel(LogLevel.None));

const SOURCE = 'os.system("ls " + path)\npassword = "admin123"';

describe("applyFixModel", () => {
	it("fills only delegable issues and marks the fix as proposed by the model", () => {
		const report = analyzeSource(SOURCE, only("security"));
		const model: FixModel = {
			propose: (issue) => Effect.succeed(`# review ${issue.ruleId}`),
		};
		const fixed = Effect.runSync(applyFixModel(report, model));
		expect(
			fixed.issues.map((i) => [i.ruleId, i.suggestedFix, i.fixSource, i.delegable]),
		).toEqual([
			["sec-command-injection", "# review sec-command-injection", "model", true],
			[
				"sec-hardcoded-credential",
				'password = os.environ["PASSWORD"]',
				"rule",
				false,
			],
		]);
		expect(fixed.securityScore).toBe(report.securityScore);
	});

	it("leaves the issue unchanged when the model fails or declines", () => {
		const report = analyzeSource(SOURCE, only("security"));
		const failing: FixModel = {
			propose: (issue) =>
				Effect.fail(
					new FixModelError({
						ruleId: issue.ruleId,
						lineNumber: issue.lineNumber,
						detail: "model unavailable",
					}),
				),
		};
		const declining: FixModel = { propose: () => Effect.succeed(null) };
		expect(Effect.runSync(silent(applyFixModel(report, failing)))).toEqual(report);
		expect(Effect.runSync(applyFixModel(report, declining))).toEqual(report);
	});
});

describe("analyzeBatchEffect", () => {
	it("analyses entries in order and counts failures", () => {
		const result = Effect.runSync(
			analyzeBatchEffect({
				codes: [
					{ code: 'password = "admin123"', file_name: "a.py" },
					{ code: "", file_name: "b.py" },
				],
				options: DEFAULT_WIRE_OPTIONS,
			}),
		);
		expect(result.totalProcessed).toBe(2);
		expect(result.successful).toBe(1);
		expect(result.failed).toBe(1);
		expect(result.results.map((r) => [r.index, r.fileName, r.error])).toEqual([
			[0, "a.py", null],
			[1, "b.py", "Source text is empty"],
		]);
	});

	it("refuses more than 20 entries", () => {
		const codes = Array.from({ length: 21 }, (_, index) => ({
			code: "x = 1",
			file_name: `file_${index}.py`,
		}));
		const result = Effect.runSync(
			Effect.either(analyzeBatchEffect({ codes, options: DEFAULT_WIRE_OPTIONS })),
		);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.limit).toBe(20);
			expect(result.left.received).toBe(21);
		}
	});
});

describe("compareSources", () => {
	it("reports the fixed issues and score change", () => {
		const comparison = compareSources(
			'password = "admin123"',
			'password = os.environ["PASSWORD"]',
			only("security"),
		);
		expect(comparison.improvement).toEqual({
			issuesFixed: 1,
			securityImprovement: 25,
			performanceImprovement: 0,
			complexityChange: 0,
		});
		expect(comparison.summary).toBe(
			"Fixed 1 issues. Security improved by 25 points",
		);
	});
});
