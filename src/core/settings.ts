// CHANGE: Default analyzer settings and CLI-over-config precedence
// PURITY: CORE
// INVARIANT: A CLI value, when given, always wins over the config file
// COMPLEXITY: O(1)

import type { AnalyzerConfig, CLIOptions } from "./types/index.js";
import { DEFAULT_WIRE_OPTIONS } from "./wire/request.js";

export const DEFAULT_CONFIG: AnalyzerConfig = {
	options: DEFAULT_WIRE_OPTIONS,
	failOn: "critical",
	format: "pretty",
};

/**
 * Effective settings for one CLI run.
 *
 * @pure true
 *
 * @example
 * ```ts
 * mergeSettings(DEFAULT_CONFIG, { optionOverrides: { security: false }, verbose: false, help: false }).options.security
 * // => false
 * ```
 */
export function mergeSettings(
	config: AnalyzerConfig,
	cli: CLIOptions,
): AnalyzerConfig {
	return {
		options: { ...config.options, ...cli.optionOverrides },
		failOn: cli.failOn ?? config.failOn,
		format: cli.format ?? config.format,
	};
}
