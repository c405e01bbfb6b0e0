// CHANGE: Public API entry point for library consumers
// WHY: Export APP operations and CORE building blocks; SHELL internals stay private
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, Effect descriptions or typed interfaces
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// ANALYSIS OPERATIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Analyse one source text.
 *
 * @example
 * ```typescript
 * import { analyzeSource } from "code-scan-engine";
 *
 * const report = analyzeSource('password = "admin123"', {
 *   enabledCategories: new Set(["security"]),
 * });
 * // report.issues[0].cweId === "CWE-798"
 * ```
 */
export {
	analyzeBytesEffect,
	analyzeRequest,
	analyzeRequestEffect,
	analyzeSource,
	analyzeSourceEffect,
} from "./app/analyze.js";
export type { AnalyzeContext } from "./app/analyze.js";
export { analyzeBatchEffect } from "./app/batch.js";
export { compareSources, compareSourcesEffect } from "./app/compare.js";
export { applyFixModel } from "./app/fix-model.js";
export { runAnalyzer } from "./app/runAnalyzer.js";
export type { RunError } from "./app/runAnalyzer.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE BUILDING BLOCKS
// ═══════════════════════════════════════════════════════════════════════════════

export { computeExitCode, deriveDecisionState } from "./core/decision.js";
export {
	BatchLimitError,
	ConfigError,
	describeError,
	FixModelError,
	FSError,
	InvalidInputError,
	InvalidRequestError,
	RegistryError,
	RuleEvaluationFault,
	UsageError,
} from "./core/errors.js";
export type { AppError } from "./core/errors.js";
export { extractStructure } from "./core/extract/structure.js";
export type { FixModel } from "./core/fix/model.js";
export { attachFixes } from "./core/fix/suggest.js";
export type { ExitCode } from "./core/models.js";
export type { BatchEntryResult, BatchResult } from "./core/report/batch.js";
export type { Comparison, Improvement } from "./core/report/compare.js";
export { DEFAULT_CATALOG } from "./core/rules/catalog/index.js";
export { defaultRegistry, makeRuleRegistry } from "./core/rules/registry.js";
export type { RuleRegistry } from "./core/rules/registry.js";
export { renderTemplate } from "./core/rules/template.js";
export { scanAll, scanCategory } from "./core/scan/scanner.js";
export { complexityMetrics, lineMetrics } from "./core/scoring/complexity.js";
export { categoryScore, SEVERITY_WEIGHTS } from "./core/scoring/scores.js";
export { makeSourceUnit } from "./core/source/source.js";
export * from "./core/types/index.js";
export {
	MAX_BATCH_ENTRIES,
	parseAnalysisRequest,
	parseBatchRequest,
	parseCompareRequest,
	parseWireRequest,
} from "./core/wire/request.js";
export { toWireReport } from "./core/wire/report.js";
