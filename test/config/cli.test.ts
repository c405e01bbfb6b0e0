// CHANGE: Unit tests for code-scan argument parsing
// WHY: Flags and positional arguments must parse deterministically; bad input is a UsageError value
// INVARIANT: Right(options) ∧ ¬options.help → exactly one of targetPath, requestPath is set

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../src/core/types/index.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";

const parsed = (args: readonly string[]): CLIOptions | null =>
	Either.getOrNull(parseCLIArgs(args));

const usage = (args: readonly string[]): string | null => {
	const result = parseCLIArgs(args);
	return Either.isLeft(result) ? result.left.detail : null;
};

describe("parseCLIArgs: targets and switches", () => {
	it("parses a single file with defaults", (): void => {
		expect(parsed(["app.py"])).toEqual({
			targetPath: "app.py",
			optionOverrides: {},
			verbose: false,
			help: false,
		});
	});

	it("parses value flags and disabled options", (): void => {
		expect(
			parsed([
				"app.py",
				"--format",
				"json",
				"--fail-on",
				"warning",
				"--no-type-hints",
				"-v",
			]),
		).toEqual({
			targetPath: "app.py",
			format: "json",
			failOn: "warning",
			optionOverrides: { type_hints: false },
			verbose: true,
			help: false,
		});
	});

	it("reads request and config paths", (): void => {
		expect(parsed(["--request", "req.json", "--config", "scan.json"])).toEqual({
			requestPath: "req.json",
			configPath: "scan.json",
			optionOverrides: {},
			verbose: false,
			help: false,
		});
	});

	it("turns --only into a full set of flags", (): void => {
		expect(parsed(["--only", "security,code-smells", "app.py"])?.optionOverrides).toEqual({
			syntax: false,
			security: true,
			performance: false,
			code_smells: true,
			complexity: false,
			dead_code: false,
			type_hints: false,
		});
	});

	it("lets --no-<option> win over --only", (): void => {
		expect(
			parsed(["--only", "security", "--no-security", "app.py"])?.optionOverrides
				.security,
		).toBe(false);
	});

	it("accepts --help without a target", (): void => {
		expect(parsed(["--help"])?.help).toBe(true);
	});
});

const USAGE_CASES: Array<[string[], string]> = [
	[[], "Missing <file> or --request <path>"],
	[["a.py", "b.py"], "Unexpected argument: b.py"],
	[["--request", "r.json", "a.py"], "Pass either <file> or --request, not both"],
	[
		["--request", "r.json", "--compare", "b.py"],
		"--compare needs a <file> to compare against",
	],
	[["--format", "xml", "a.py"], "Unknown format: xml"],
	[["--fail-on", "fatal", "a.py"], "Unknown severity level: fatal"],
	[["a.py", "--fail-on"], "--fail-on requires a value"],
	[["--no-colors", "a.py"], "Unknown option: --no-colors"],
	[["--only", "security,speed", "a.py"], "Unknown option in --only: speed"],
	[["--bogus", "a.py"], "Unknown flag: --bogus"],
];

describe("parseCLIArgs: usage errors", () => {
	it.each(USAGE_CASES)("%j → %s", (args, message) => {
		expect(usage(args)).toBe(message);
	});
});
