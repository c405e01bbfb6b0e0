// CHANGE: Write rendered outcomes to stdout
// PURITY: SHELL
// EFFECT: Effect<void, never>

import { Effect } from "effect";

import { renderOutcome } from "../../core/format/report-text.js";
import type { Outcome } from "../../core/format/report-text.js";
import type { OutputFormat } from "../../core/types/index.js";

export const printOutcome = (
	outcome: Outcome,
	format: OutputFormat,
): Effect.Effect<void> =>
	Effect.sync(() => {
		console.log(renderOutcome(outcome, format));
	});

export const printText = (text: string): Effect.Effect<void> =>
	Effect.sync(() => {
		console.log(text);
	});
