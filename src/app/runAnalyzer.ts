// CHANGE: CLI orchestration: settings, input, analysis, output, exit decision
// WHY: APP composes SHELL reads and CORE analysis; the exit code is returned as a value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, ConfigError | FSError | InvalidRequestError | BatchLimitError>
// INVARIANT: Exactly one outcome is printed per successful run
// COMPLEXITY: O(size of analysed input)

import * as path from "node:path";

import { Effect, Logger, LogLevel } from "effect";
import { match } from "ts-pattern";

import { computeExitCode, deriveDecisionState } from "../core/decision.js";
import type {
	BatchLimitError,
	ConfigError,
	FSError,
	InvalidRequestError,
} from "../core/errors.js";
import { outcomeReports } from "../core/format/report-text.js";
import type { Outcome } from "../core/format/report-text.js";
import type { ExitCode } from "../core/models.js";
import { compareReports } from "../core/report/compare.js";
import { mergeSettings } from "../core/settings.js";
import type {
	AnalyzerConfig,
	CLIOptions,
	WireRequest,
} from "../core/types/index.js";
import {
	optionsToAnalysisOptions,
	parseWireRequest,
} from "../core/wire/request.js";
import { loadAnalyzerConfig, USAGE } from "../shell/config/index.js";
import { printOutcome, printText } from "../shell/output/printer.js";
import { readRequestFile, readSourceFile } from "../shell/source/reader.js";
import { analyzeBytesEffect, analyzeSourceEffect } from "./analyze.js";
import { analyzeBatchEffect } from "./batch.js";
import { compareSourcesEffect } from "./compare.js";

// Logs go to stderr so json output on stdout stays parseable
const stderrLogger = Logger.replace(
	Logger.defaultLogger,
	Logger.withConsoleError(Logger.logfmtLogger),
);

export type RunError =
	| ConfigError
	| FSError
	| InvalidRequestError
	| BatchLimitError;

const outcomeForRequest = (
	request: WireRequest,
): Effect.Effect<Outcome, BatchLimitError> =>
	match(request)
		.with({ _tag: "Single" }, ({ request: single }) =>
			analyzeSourceEffect(
				single.code,
				optionsToAnalysisOptions(single.options),
				{ fileName: single.file_name },
			).pipe(Effect.map((report): Outcome => ({ _tag: "Report", report }))),
		)
		.with({ _tag: "Batch" }, ({ request: batch }) =>
			analyzeBatchEffect(batch).pipe(
				Effect.map((result): Outcome => ({ _tag: "Batch", batch: result })),
			),
		)
		.with({ _tag: "Compare" }, ({ request: compare }) =>
			compareSourcesEffect(
				compare.code_before,
				compare.code_after,
				optionsToAnalysisOptions(compare.options),
			).pipe(
				Effect.map((comparison): Outcome => ({ _tag: "Comparison", comparison })),
			),
		)
		.exhaustive();

/**
 * Outcome of a `--request` run. Options come from the request, not the config.
 */
function requestOutcome(
	requestPath: string,
	cwd: string,
): Effect.Effect<Outcome, FSError | InvalidRequestError | BatchLimitError> {
	return Effect.gen(function* () {
		const json = yield* readRequestFile(path.resolve(cwd, requestPath));
		const request = yield* parseWireRequest(json);
		return yield* outcomeForRequest(request);
	});
}

function fileOutcome(
	targetPath: string,
	comparePath: string | undefined,
	settings: AnalyzerConfig,
	cwd: string,
): Effect.Effect<Outcome, FSError> {
	const options = optionsToAnalysisOptions(settings.options);
	const analyzeFile = (filePath: string) =>
		readSourceFile(path.resolve(cwd, filePath)).pipe(
			Effect.flatMap((bytes) =>
				analyzeBytesEffect(bytes, options, { fileName: filePath }),
			),
		);
	if (comparePath === undefined) {
		return analyzeFile(targetPath).pipe(
			Effect.map((report): Outcome => ({ _tag: "Report", report })),
		);
	}
	return Effect.all([analyzeFile(targetPath), analyzeFile(comparePath)]).pipe(
		Effect.map(([before, after]): Outcome => ({
			_tag: "Comparison",
			comparison: compareReports(before, after),
		})),
	);
}

/**
 * Runs one CLI invocation.
 *
 * @param cli - Parsed command line
 * @param cwd - Base directory for relative paths and the default config file
 * @returns Exit code as a value
 *
 * @effect Effect<ExitCode, RunError>
 * @invariant failOn = "none" ∧ input valid → exit code 0
 */
export function runAnalyzer(
	cli: CLIOptions,
	cwd: string = process.cwd(),
): Effect.Effect<ExitCode, RunError> {
	const program = Effect.gen(function* () {
		if (cli.help) {
			yield* printText(USAGE);
			return 0 as const;
		}
		const settings = mergeSettings(
			yield* loadAnalyzerConfig(cli.configPath, cwd),
			cli,
		);
		const outcome =
			cli.requestPath === undefined
				? yield* fileOutcome(cli.targetPath ?? "", cli.comparePath, settings, cwd)
				: yield* requestOutcome(cli.requestPath, cwd);
		yield* printOutcome(outcome, settings.format);
		return computeExitCode(
			deriveDecisionState(outcomeReports(outcome), settings.failOn),
		);
	});
	return program.pipe(
		Logger.withMinimumLogLevel(cli.verbose ? LogLevel.Debug : LogLevel.Warning),
		Effect.provide(stderrLogger),
	);
}
