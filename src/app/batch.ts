// CHANGE: Batch analysis of up to MAX_BATCH_ENTRIES sources
// PURITY: APP
// EFFECT: Effect<BatchResult, BatchLimitError>
// INVARIANT: results[i] describes codes[i]; one invalid entry never fails the batch
// COMPLEXITY: O(Σ entry cost)

import { Effect } from "effect";

import { BatchLimitError } from "../core/errors.js";
import { summarizeBatch } from "../core/report/batch.js";
import type { BatchResult } from "../core/report/batch.js";
import type { RuleRegistry } from "../core/rules/registry.js";
import type { BatchRequest } from "../core/types/index.js";
import {
	MAX_BATCH_ENTRIES,
	optionsToAnalysisOptions,
} from "../core/wire/request.js";
import { analyzeSourceEffect } from "./analyze.js";

/**
 * Analyses every entry of a batch with shared options.
 *
 * @effect Effect<BatchResult, BatchLimitError>
 * @invariant |codes| > MAX_BATCH_ENTRIES → fails before analysing anything
 */
export function analyzeBatchEffect(
	request: BatchRequest,
	registry?: RuleRegistry,
): Effect.Effect<BatchResult, BatchLimitError> {
	if (request.codes.length > MAX_BATCH_ENTRIES) {
		return Effect.fail(
			new BatchLimitError({
				limit: MAX_BATCH_ENTRIES,
				received: request.codes.length,
			}),
		);
	}
	const options = optionsToAnalysisOptions(request.options);
	return Effect.forEach(request.codes, (entry) =>
		analyzeSourceEffect(entry.code, options, {
			fileName: entry.file_name,
			...(registry === undefined ? {} : { registry }),
		}),
	).pipe(Effect.map(summarizeBatch));
}
