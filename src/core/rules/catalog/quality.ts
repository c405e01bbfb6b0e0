// CHANGE: Code quality rules (formatting, exception handling, leftovers)
// PURITY: CORE
// COMPLEXITY: O(|line|) per rule evaluation

import { pattern, structural } from "../../types/index.js";
import type { Rule } from "../../types/index.js";

export const MAX_LINE_LENGTH = 120;

const MAGIC_NUMBER = /(?<![\w.])\d{4,}(?![\w.])/u;
const CONSTANT_DEFINITION = /^[A-Z_][A-Z0-9_]*\s*(?::[^=]+)?=/u;
const COMMENTED_CODE =
	/^#\s*(?:def\s+\w+\s*\(|class\s+\w+|import\s+\w|from\s+\S+\s+import\b|return\b|print\(|(?:if|for|while|elif)\b.*:$|[A-Za-z_][\w.]*\s*=[^=]|[A-Za-z_][\w.]*\(.*\)$)/u;

export const qualityRules: readonly Rule[] = [
	{
		id: "quality-long-line",
		title: "Long line",
		category: "quality",
		severity: "info",
		matcher: structural((line) => line.rawText.length > MAX_LINE_LENGTH),
		cweId: null,
		descriptionTemplate: `Line is longer than ${MAX_LINE_LENGTH} characters`,
		fixTemplate: `Wrap the line to at most ${MAX_LINE_LENGTH} characters`,
		explanation: null,
	},
	{
		id: "quality-magic-number",
		title: "Magic number",
		category: "quality",
		severity: "info",
		matcher: structural((line) => {
			const code = line.codeText.trim();
			return MAGIC_NUMBER.test(code) && !CONSTANT_DEFINITION.test(code);
		}),
		cweId: null,
		descriptionTemplate: "Unnamed numeric literal in code",
		fixTemplate: "Give the value a name as a module-level constant",
		explanation: null,
	},
	{
		id: "quality-commented-code",
		title: "Commented-out code",
		category: "quality",
		severity: "info",
		matcher: structural(
			(line) =>
				line.constructs.has("comment") &&
				COMMENTED_CODE.test(line.rawText.trim()),
		),
		cweId: null,
		descriptionTemplate: "Commented-out code",
		fixTemplate: "Delete the commented-out code",
		explanation: "Version control keeps old code; comments drift out of date.",
	},
	{
		id: "quality-multiple-statements",
		title: "Multiple statements on one line",
		category: "quality",
		severity: "warning",
		matcher: structural((line) => line.constructs.has("multi-statement")),
		cweId: null,
		descriptionTemplate: "Several statements separated by ';' on one line",
		fixTemplate: "Put each statement on its own line",
		explanation: null,
	},
	{
		id: "quality-bare-except",
		title: "Bare except",
		category: "quality",
		severity: "warning",
		matcher: structural((line) => line.constructs.has("bare-except")),
		cweId: "CWE-396",
		descriptionTemplate:
			"Bare except also catches SystemExit and KeyboardInterrupt",
		fixTemplate: "except Exception:",
		explanation:
			"Catching everything hides programming errors and blocks interpreter shutdown.",
	},
	{
		id: "quality-broad-except",
		title: "Broad exception handler",
		category: "quality",
		severity: "info",
		matcher: pattern(/^\s*except\s+\(?\s*(Exception|BaseException)\b/u),
		cweId: "CWE-396",
		descriptionTemplate: "Handler catches the broad {1} type",
		fixTemplate: "Catch only the exception types this block can handle",
		explanation: null,
	},
	{
		id: "quality-todo-comment",
		title: "Unresolved marker comment",
		category: "quality",
		severity: "info",
		matcher: pattern(/#.*\b(TODO|FIXME|XXX|HACK)\b/u),
		cweId: null,
		descriptionTemplate: "{1} comment left in code",
		fixTemplate: "Resolve the {1} or move it to the issue tracker",
		explanation: null,
	},
	{
		id: "quality-mutable-default",
		title: "Mutable default argument",
		category: "quality",
		severity: "warning",
		matcher: pattern(
			/^\s*(?:async\s+)?def\s+\w+\s*\(.*?\b(\w+)\s*(?::\s*[^=,)]+)?=\s*(\[\]|\{\}|list\(\)|dict\(\)|set\(\))/u,
		),
		cweId: null,
		descriptionTemplate: "Mutable default value {2} for parameter '{1}'",
		fixTemplate: "{1}=None, then create the value inside the function",
		explanation:
			"Default values are evaluated once, so every call shares and mutates the same object.",
	},
];
