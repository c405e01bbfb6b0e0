// CHANGE: Thin APP delegator: parse arguments, run, map errors to an exit code
// PURITY: APP (no process.exit; only composition)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Every failure is reported on stderr and becomes exit code 1
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import { runAnalyzer } from "./app/runAnalyzer.js";
import { describeError } from "./core/errors.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs, USAGE } from "./shell/config/index.js";

const reportFailure = (message: string): Effect.Effect<ExitCode> =>
	Effect.sync(() => {
		console.error(`code-scan: ${message}`);
		return 1 as const;
	});

/**
 * Entry for programmatic CLI usage (without terminating the process).
 *
 * @param args - Arguments after the executable and script path
 * @effect Effect<ExitCode, never>
 */
export function main(
	args: readonly string[] = process.argv.slice(2),
): Effect.Effect<ExitCode> {
	return Either.match(parseCLIArgs(args), {
		onLeft: (error) => reportFailure(`${error.detail}\n\n${USAGE}`),
		onRight: (cli) =>
			runAnalyzer(cli).pipe(
				Effect.catchAll((error) => reportFailure(describeError(error))),
			),
	});
}
