// CHANGE: Local complexity rules (nesting, conditions, signatures)
// PURITY: CORE
// COMPLEXITY: O(|line|) per rule evaluation

import { structural } from "../../types/index.js";
import type { LineContext, Rule } from "../../types/index.js";
import { parameterNames } from "./parameters.js";

export const MAX_NESTING_LEVEL = 4;
export const MAX_BOOLEAN_OPERATORS = 3;
export const MAX_PARAMETERS = 5;

const opensBranch = (line: LineContext): boolean =>
	line.constructs.has("conditional") || line.constructs.has("loop");

export const complexityRules: readonly Rule[] = [
	{
		id: "complexity-deep-nesting",
		title: "Deep nesting",
		category: "complexity",
		severity: "warning",
		matcher: structural(
			(line) => opensBranch(line) && line.indentLevel >= MAX_NESTING_LEVEL,
		),
		cweId: null,
		descriptionTemplate: `Control structure nested ${MAX_NESTING_LEVEL} or more levels deep`,
		fixTemplate: null,
		explanation:
			"Early returns or extracted helpers keep each function shallow enough to read.",
	},
	{
		id: "complexity-complex-condition",
		title: "Complex condition",
		category: "complexity",
		severity: "info",
		matcher: structural(
			(line) =>
				opensBranch(line) && line.booleanOperators >= MAX_BOOLEAN_OPERATORS,
		),
		cweId: null,
		descriptionTemplate: `Condition combines ${MAX_BOOLEAN_OPERATORS} or more boolean operators`,
		fixTemplate: "Extract parts of the condition into named variables",
		explanation: null,
	},
	{
		id: "complexity-long-parameter-list",
		title: "Long parameter list",
		category: "complexity",
		severity: "info",
		matcher: structural(
			(line) =>
				line.constructs.has("function-def") &&
				parameterNames(line.codeText).length > MAX_PARAMETERS,
		),
		cweId: null,
		descriptionTemplate: `Function takes more than ${MAX_PARAMETERS} parameters`,
		fixTemplate: "Group related parameters into a dataclass",
		explanation: null,
	},
];
