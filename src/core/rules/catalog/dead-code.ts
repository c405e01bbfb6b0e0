// CHANGE: Dead code rules backed by the extractor's flow and binding facts
// PURITY: CORE
// COMPLEXITY: O(1) per rule evaluation

import { structural } from "../../types/index.js";
import type { Rule } from "../../types/index.js";

export const deadCodeRules: readonly Rule[] = [
	{
		id: "dead-code-unreachable",
		title: "Unreachable code",
		category: "dead_code",
		severity: "warning",
		matcher: structural((line) => line.constructs.has("unreachable")),
		cweId: "CWE-561",
		descriptionTemplate:
			"Statement follows return, raise, break or continue and never runs",
		fixTemplate: "Remove the unreachable statement",
		explanation: null,
	},
	{
		id: "dead-code-unused-binding",
		title: "Unused name",
		category: "dead_code",
		severity: "info",
		matcher: structural((line) => line.constructs.has("unused-binding")),
		cweId: "CWE-563",
		descriptionTemplate: "Name is bound here and never referenced",
		fixTemplate: "Remove the binding or prefix the name with an underscore",
		explanation: null,
	},
];
