// CHANGE: Analysis pipeline composing the core passes
// WHY: Extractor → scanner → fixes → scores → aggregator is the only path text takes to a report
// FORMAT THEOREM: ∀text, options: analyzeSource(text, options) = analyzeSource(text, options)
// PURITY: APP (pure composition; the only effect is logging)
// EFFECT: Effect<AnalysisReport, never>
// INVARIANT: Invalid input yields success = false, never a failed Effect
// COMPLEXITY: O(r·n) where r = enabled rules, n = lines

import { Effect, Either } from "effect";

import type { InvalidInputError } from "../core/errors.js";
import { extractStructure } from "../core/extract/structure.js";
import { attachFixes } from "../core/fix/suggest.js";
import { buildReport, failedReport } from "../core/report/aggregate.js";
import { defaultRegistry } from "../core/rules/registry.js";
import type { RuleRegistry } from "../core/rules/registry.js";
import { scanAll } from "../core/scan/scanner.js";
import { complexityMetrics, lineMetrics } from "../core/scoring/complexity.js";
import { categoryScore } from "../core/scoring/scores.js";
import type { CategoryScore } from "../core/scoring/scores.js";
import { decodeSourceBytes, makeSourceUnit } from "../core/source/source.js";
import type {
	AnalysisOptions,
	AnalysisReport,
	AnalysisRequest,
	SourceUnit,
	WireReport,
} from "../core/types/index.js";
import { optionsToAnalysisOptions } from "../core/wire/request.js";
import { toWireReport } from "../core/wire/report.js";

/**
 * Optional inputs of one analysis call.
 *
 * @property registry Defaults to the built-in catalog
 */
export interface AnalyzeContext {
	readonly fileName?: string | null;
	readonly registry?: RuleRegistry;
}

const logClamp = (score: CategoryScore): Effect.Effect<void> =>
	score.clamped
		? Effect.logDebug(
				`${score.category} score clamped to 0 (penalty ${score.penalty})`,
			)
		: Effect.void;

function analyzeUnit(
	unit: SourceUnit,
	options: AnalysisOptions,
	registry: RuleRegistry,
): Effect.Effect<AnalysisReport> {
	return Effect.gen(function* () {
		const lines = extractStructure(unit);
		const scan = yield* scanAll(registry, lines, options);
		const issues = attachFixes(registry, scan.issues);
		const security = categoryScore(issues, "security");
		const performance = categoryScore(issues, "performance");
		yield* logClamp(security);
		yield* logClamp(performance);
		return buildReport(registry, {
			fileName: unit.filename,
			issues,
			faults: scan.faults,
			securityScore: security.score,
			performanceScore: performance.score,
			complexityMetrics: complexityMetrics(lines),
			lineMetrics: lineMetrics(lines),
		});
	});
}

function analyzeValidated(
	unit: Either.Either<SourceUnit, InvalidInputError>,
	options: AnalysisOptions,
	context: AnalyzeContext,
): Effect.Effect<AnalysisReport> {
	const registry = context.registry ?? defaultRegistry();
	return Either.match(unit, {
		onLeft: (error) =>
			Effect.logDebug(`Rejected input: ${error.detail}`).pipe(
				Effect.as(failedReport(context.fileName ?? null, error)),
			),
		onRight: (valid) => analyzeUnit(valid, options, registry),
	});
}

/**
 * Analyses source text.
 *
 * @effect Effect<AnalysisReport, never>
 * @invariant text.trim() = "" → report.success = false ∧ report.issues = []
 */
export const analyzeSourceEffect = (
	text: string,
	options: AnalysisOptions,
	context: AnalyzeContext = {},
): Effect.Effect<AnalysisReport> =>
	analyzeValidated(
		makeSourceUnit(text, context.fileName ?? null),
		options,
		context,
	);

/**
 * Analyses raw bytes, rejecting anything that is not UTF-8 text.
 *
 * @effect Effect<AnalysisReport, never>
 */
export const analyzeBytesEffect = (
	bytes: Uint8Array,
	options: AnalysisOptions,
	context: AnalyzeContext = {},
): Effect.Effect<AnalysisReport> =>
	analyzeValidated(
		decodeSourceBytes(bytes, context.fileName ?? null),
		options,
		context,
	);

/**
 * Synchronous entry point for library consumers.
 *
 * @example
 * ```ts
 * const report = analyzeSource('password = "admin123"', {
 *   enabledCategories: new Set(["security"]),
 * });
 * report.securityScore // => 75
 * ```
 */
export const analyzeSource = (
	text: string,
	options: AnalysisOptions,
	context: AnalyzeContext = {},
): AnalysisReport => Effect.runSync(analyzeSourceEffect(text, options, context));

/**
 * Analyses a validated wire request and answers in the wire format.
 */
export const analyzeRequestEffect = (
	request: AnalysisRequest,
	registry?: RuleRegistry,
): Effect.Effect<WireReport> =>
	analyzeSourceEffect(request.code, optionsToAnalysisOptions(request.options), {
		fileName: request.file_name,
		...(registry === undefined ? {} : { registry }),
	}).pipe(Effect.map(toWireReport));

export const analyzeRequest = (
	request: AnalysisRequest,
	registry?: RuleRegistry,
): WireReport => Effect.runSync(analyzeRequestEffect(request, registry));
