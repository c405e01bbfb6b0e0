// CHANGE: Syntax rules reported from lexical facts only
// PURITY: CORE
// INVARIANT: No rule here parses beyond one line of context
// COMPLEXITY: O(1) per rule evaluation

import { structural } from "../../types/index.js";
import type { Construct, Rule, StructuralMatcher } from "../../types/index.js";

const tagged = (construct: Construct): StructuralMatcher =>
	structural((line) => line.constructs.has(construct));

export const syntaxRules: readonly Rule[] = [
	{
		id: "syntax-missing-colon",
		title: "Missing colon",
		category: "syntax",
		severity: "error",
		matcher: tagged("missing-colon"),
		cweId: null,
		descriptionTemplate: "Block header does not end with ':'",
		fixTemplate: "{line}:",
		explanation: null,
	},
	{
		id: "syntax-unterminated-string",
		title: "Unterminated string",
		category: "syntax",
		severity: "error",
		matcher: tagged("unterminated-string"),
		cweId: null,
		descriptionTemplate: "String literal is not closed",
		fixTemplate: "Close the string literal with its opening quote",
		explanation: null,
	},
	{
		id: "syntax-unbalanced-bracket",
		title: "Unbalanced bracket",
		category: "syntax",
		severity: "error",
		matcher: tagged("unbalanced-bracket"),
		cweId: null,
		descriptionTemplate: "Closing bracket does not match an open bracket",
		fixTemplate: "Remove the stray closing bracket or add the matching opener",
		explanation: null,
	},
	{
		id: "syntax-unclosed-bracket",
		title: "Unclosed bracket",
		category: "syntax",
		severity: "error",
		matcher: tagged("unclosed-bracket"),
		cweId: null,
		descriptionTemplate: "Bracket opened here is never closed",
		fixTemplate: "Close the bracket opened on this line",
		explanation: null,
	},
	{
		id: "syntax-mixed-indentation",
		title: "Mixed indentation",
		category: "syntax",
		severity: "warning",
		matcher: tagged("mixed-indentation"),
		cweId: null,
		descriptionTemplate: "Indentation mixes tabs and spaces",
		fixTemplate: "Indent with spaces only",
		explanation: null,
	},
];
