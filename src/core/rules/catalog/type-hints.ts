// CHANGE: Type annotation rules for function headers
// PURITY: CORE
// COMPLEXITY: O(|line|) per rule evaluation

import { pattern, structural } from "../../types/index.js";
import type { Rule } from "../../types/index.js";
import { parseParameters } from "./parameters.js";

export const typeHintRules: readonly Rule[] = [
	{
		id: "type-hints-missing-return",
		title: "Missing return annotation",
		category: "type_hints",
		severity: "info",
		matcher: pattern(/^\s*(?:async\s+)?def\s+(\w+)\s*\(([^)]*)\)\s*:/u),
		cweId: null,
		descriptionTemplate: "Function '{1}' has no return type annotation",
		fixTemplate: "def {1}({2}) -> Any:",
		explanation: null,
	},
	{
		id: "type-hints-untyped-parameter",
		title: "Untyped parameter",
		category: "type_hints",
		severity: "info",
		matcher: structural(
			(line) =>
				/^\s*(?:async\s+)?def\s/u.test(line.codeText) &&
				parseParameters(line.codeText).some((parameter) => !parameter.annotated),
		),
		cweId: null,
		descriptionTemplate: "Function parameters without type annotations",
		fixTemplate: null,
		explanation: null,
	},
];
