// CHANGE: Configuration and CLI option types for the analyzer
// PURITY: CORE
// COMPLEXITY: O(1) - type declarations only

import type { SeverityThreshold } from "./severity.js";
import type { WireOptions } from "./wire.js";

export type OutputFormat = "pretty" | "json";

/**
 * Configuration read from code-scan.config.json.
 *
 * @property options Category flags, wire names
 * @property failOn Lowest severity that makes the CLI exit with 1
 * @property format Default output format
 */
export interface AnalyzerConfig {
	readonly options: WireOptions;
	readonly failOn: SeverityThreshold;
	readonly format: OutputFormat;
}

/**
 * Command line options for code-scan.
 *
 * @property targetPath File to analyse (absent when requestPath is used)
 * @property requestPath JSON request file in the wire format
 * @property comparePath "After" version of targetPath for a before/after comparison
 * @property optionOverrides Flags set by --no-<option> / --only
 * @property help True when usage text was requested
 */
export interface CLIOptions {
	readonly targetPath?: string;
	readonly requestPath?: string;
	readonly comparePath?: string;
	readonly configPath?: string;
	readonly format?: OutputFormat;
	readonly failOn?: SeverityThreshold;
	readonly optionOverrides: Partial<WireOptions>;
	readonly verbose: boolean;
	readonly help: boolean;
}
