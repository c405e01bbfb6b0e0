// CHANGE: Tests for configuration parsing and loading
// PURITY: SHELL (temporary directories only)
// INVARIANT: Missing default file → defaults; missing explicit file or malformed content → ConfigError

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, mergeSettings } from "../../../src/core/settings.js";
import { DEFAULT_WIRE_OPTIONS } from "../../../src/core/wire/request.js";
import {
	CONFIG_FILE_NAME,
	loadAnalyzerConfig,
	parseAnalyzerConfig,
} from "../../../src/shell/config/index.js";

describe("parseAnalyzerConfig", () => {
	it("defaults every absent field", () => {
		expect(Either.getOrNull(parseAnalyzerConfig({ failOn: "warning" }, "cfg.json"))).toEqual({
			options: DEFAULT_WIRE_OPTIONS,
			failOn: "warning",
			format: "pretty",
		});
	});

	it("rejects malformed values with the file path", () => {
		const result = parseAnalyzerConfig({ format: "xml" }, "cfg.json");
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left.path).toBe("cfg.json");
			expect(result.left.detail).toBe("format must be pretty or json");
		}
		const notObject = parseAnalyzerConfig([], "cfg.json");
		expect(Either.isLeft(notObject) ? notObject.left.detail : null).toBe(
			"config must be a JSON object",
		);
	});
});

describe("mergeSettings", () => {
	it("prefers values given on the command line", () => {
		expect(
			mergeSettings(DEFAULT_CONFIG, {
				failOn: "none",
				optionOverrides: { security: false },
				verbose: false,
				help: false,
			}),
		).toEqual({
			options: { ...DEFAULT_WIRE_OPTIONS, security: false },
			failOn: "none",
			format: "pretty",
		});
	});
});

describe("loadAnalyzerConfig", () => {
	let dir = "";

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "code-scan-config-"));
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("falls back to defaults when the default file is absent", () => {
		expect(Effect.runSync(loadAnalyzerConfig(undefined, dir))).toEqual(DEFAULT_CONFIG);
	});

	it("reads the default file from the working directory", () => {
		fs.writeFileSync(
			path.join(dir, CONFIG_FILE_NAME),
			JSON.stringify({ format: "json", options: { type_hints: false } }),
		);
		expect(Effect.runSync(loadAnalyzerConfig(undefined, dir))).toEqual({
			options: { ...DEFAULT_WIRE_OPTIONS, type_hints: false },
			failOn: "critical",
			format: "json",
		});
	});

	it("fails for an explicit path that does not exist", () => {
		const result = Effect.runSync(
			Effect.either(loadAnalyzerConfig("missing.json", dir)),
		);
		expect(Either.isLeft(result) ? result.left.detail : null).toBe(
			"Config file not found",
		);
	});

	it("fails for a file that is not JSON", () => {
		fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), "{ not json");
		const result = Effect.runSync(Effect.either(loadAnalyzerConfig(undefined, dir)));
		expect(Either.isLeft(result)).toBe(true);
	});
});
