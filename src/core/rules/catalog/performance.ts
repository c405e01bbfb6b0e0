// CHANGE: Performance rules (accumulation in loops, iteration idioms, nesting)
// PURITY: CORE
// INVARIANT: Loop-sensitive rules rely on the extractor's loop-body tag
// COMPLEXITY: O(|line|) per rule evaluation

import { pattern, structural } from "../../types/index.js";
import type { LineContext, Rule } from "../../types/index.js";

const inLoop = (line: LineContext): boolean => line.constructs.has("loop-body");

const LIST_CONCAT = /\b([A-Za-z_]\w*)\s*=\s*\1\s*\+\s*\[|\+=\s*\[/u;
const STRING_CONCAT =
	/\b[A-Za-z_]\w*\s*\+=\s*(?:f?["']|str\()|\b([A-Za-z_]\w*)\s*=\s*\1\s*\+\s*(?:f?["']|str\()/u;
const PLUS = /(?<![+=])\+(?![+=])/gu;

export const performanceRules: readonly Rule[] = [
	{
		id: "perf-list-concat-in-loop",
		title: "List concatenation in loop",
		category: "performance",
		severity: "warning",
		matcher: structural(
			(line) => inLoop(line) && LIST_CONCAT.test(line.codeText),
		),
		cweId: null,
		descriptionTemplate: "List rebuilt by concatenation inside a loop",
		fixTemplate: "Use list.append() or list.extend() inside the loop",
		explanation:
			"Each concatenation copies the whole list, so the loop costs quadratic time.",
	},
	{
		id: "perf-string-concat-in-loop",
		title: "String concatenation in loop",
		category: "performance",
		severity: "warning",
		matcher: structural(
			(line) => inLoop(line) && STRING_CONCAT.test(line.codeText),
		),
		cweId: null,
		descriptionTemplate: "String built by repeated concatenation inside a loop",
		fixTemplate: 'Collect the parts in a list and call "".join(parts) after the loop',
		explanation:
			"Strings are immutable; every += allocates a new string and copies the old one.",
	},
	{
		id: "perf-range-len",
		title: "range(len(...)) iteration",
		category: "performance",
		severity: "info",
		matcher: pattern(
			/\bfor\s+(\w+)\s+in\s+range\s*\(\s*len\s*\(\s*([\w.]+)\s*\)\s*\)/u,
		),
		cweId: null,
		descriptionTemplate: "Iterating over range(len({2})) instead of the sequence",
		fixTemplate: "for {1}, item in enumerate({2}):",
		explanation: null,
	},
	{
		id: "perf-global-statement",
		title: "Global statement",
		category: "performance",
		severity: "warning",
		matcher: pattern(/^\s*global\s+([\w, ]+)/u),
		cweId: null,
		descriptionTemplate: "Module state mutated through global {1|trim}",
		fixTemplate: "Pass {1|trim} as a parameter and return the new value",
		explanation:
			"Global lookups are slower than locals and hide data flow between functions.",
	},
	{
		id: "perf-nested-loop",
		title: "Nested loop",
		category: "performance",
		severity: "warning",
		matcher: structural(
			(line) => line.constructs.has("loop") && line.loopDepth >= 1,
		),
		cweId: null,
		descriptionTemplate: "Loop nested inside another loop",
		fixTemplate: null,
		explanation:
			"Cost grows with the product of both iteration counts; a lookup table often removes the inner loop.",
	},
	{
		id: "perf-chained-string-concat",
		title: "Chained string concatenation",
		category: "performance",
		severity: "info",
		matcher: structural(
			(line) =>
				line.constructs.has("literal-string") &&
				(line.codeText.match(PLUS)?.length ?? 0) >= 3,
		),
		cweId: null,
		descriptionTemplate: "String assembled from a long chain of + operations",
		fixTemplate: "Use an f-string or str.join()",
		explanation: null,
	},
];
