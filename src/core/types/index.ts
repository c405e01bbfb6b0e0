// CHANGE: Central export file for all analysis domain types
// WHY: Single import point for types used across core, app and shell

export type { AnalyzerConfig, CLIOptions, OutputFormat } from "./config.js";
export type {
	FixSource,
	Issue,
	RawIssue,
	RuleFaultRecord,
} from "./issue.js";
export type {
	AnalysisOptions,
	AnalysisReport,
	ComplexityMetrics,
	LineMetrics,
	ReportStatus,
} from "./report.js";
export type {
	MatchCaptures,
	Matcher,
	PatternMatcher,
	Rule,
	StructuralMatcher,
} from "./rule.js";
export { pattern, structural } from "./rule.js";
export type { Category, Severity, SeverityThreshold } from "./severity.js";
export {
	CATEGORIES,
	compareSeverityDesc,
	isCategory,
	isSeverity,
	isSeverityThreshold,
	SEVERITIES,
	severityMeetsThreshold,
	severityRank,
} from "./severity.js";
export type { Construct, LineContext, SourceUnit } from "./source.js";
export type {
	AnalysisRequest,
	BatchEntry,
	BatchRequest,
	CompareRequest,
	WireIssue,
	WireIssueType,
	WireOptionName,
	WireOptions,
	WireReport,
	WireRequest,
} from "./wire.js";
