// CHANGE: Keyword and shape recognizers over masked code text
// WHY: Each recognizer is a small regex over trimmed codeText, so strings and comments never match
// PURITY: CORE
// INVARIANT: Recognizers are total and never throw
// COMPLEXITY: O(n) per line where n = |codeText|

import type { Construct } from "../types/index.js";

const KEYWORD_TAGS: ReadonlyArray<readonly [RegExp, Construct]> = [
	[/^(?:\}\s*)?(?:if|elif|else\s+if)\b/u, "conditional"],
	[/^case\s+[^=\s]/u, "conditional"],
	[/^(?:async\s+)?(?:for|while)\b/u, "loop"],
	[/^(?:\}\s*)?(?:except|catch)\b/u, "exception-handler"],
	[/^except\s*:/u, "bare-except"],
	[/^(?:async\s+)?def\s+[A-Za-z_]/u, "function-def"],
	[/^(?:export\s+)?(?:async\s+)?function\b/u, "function-def"],
	[/^class\s+[A-Za-z_]/u, "class-def"],
	[/^@[A-Za-z_]/u, "decorator"],
	[/^return\b/u, "return"],
	[/^(?:import\s+\S|from\s+\S+\s+import\b)/u, "import"],
	[/^(?:global|nonlocal)\s+[A-Za-z_]/u, "global-decl"],
];

const ASSIGNMENT =
	/^(?:(?:let|const|var)\s+)?(?<targets>[A-Za-z_][\w.]*(?:\[[^\]]*\])?(?:\s*,\s*[A-Za-z_][\w.]*)*)\s*(?::\s*[^=]+)?(?<op>\*\*|\/\/|>>|<<|[-+*/%&|^@])?=(?!=)/u;

const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
	"if",
	"elif",
	"else",
	"for",
	"while",
	"return",
	"def",
	"class",
	"import",
	"from",
	"global",
	"nonlocal",
	"with",
	"assert",
	"raise",
	"del",
	"pass",
	"yield",
	"try",
	"except",
	"finally",
	"lambda",
	"not",
	"case",
	"match",
]);

const TERMINATORS: ReadonlySet<string> = new Set([
	"return",
	"raise",
	"break",
	"continue",
	"throw",
]);

const BLOCK_HEADER =
	/^(?:async\s+)?(?:def|class|if|elif|else|for|while|try|except|finally|with)\b/u;

const DEFINITION_NAME =
	/^(?:(?:export\s+)?(?:async\s+)?function|(?:async\s+)?def|class)\s+(?<name>[A-Za-z_]\w*)/u;

const NESTED_GROUP = /\([^()]*\)|\[[^\[\]]*\]|\{[^{}]*\}/gu;

const IDENTIFIER = /[A-Za-z_]\w*/gu;

const BOOLEAN_OPERATOR = /\b(?:and|or)\b|&&|\|\|/gu;

/**
 * First identifier-like word of trimmed code, or "" when the line starts otherwise.
 *
 * @pure true
 */
export const firstWord = (code: string): string =>
	/^[A-Za-z_]\w*/u.exec(code)?.[0] ?? "";

/**
 * Keyword-driven construct tags for one trimmed code line.
 *
 * @pure true
 * @complexity O(k·n) where k = |KEYWORD_TAGS|
 */
export function keywordConstructs(code: string): readonly Construct[] {
	return KEYWORD_TAGS.filter(([regex]) => regex.test(code)).map(
		([, tag]) => tag,
	);
}

/**
 * Names bound by a plain assignment, or null when the line is not an assignment.
 * Augmented assignments and attribute/subscript targets bind no new names.
 *
 * @pure true
 * @invariant result = null ↔ line is not an assignment
 *
 * @example
 * ```ts
 * assignmentTargets("a, b = pair")  // => ["a", "b"]
 * assignmentTargets("total += 1")   // => []
 * assignmentTargets("if x == 1:")   // => null
 * ```
 */
export function assignmentTargets(code: string): readonly string[] | null {
	if (STATEMENT_KEYWORDS.has(firstWord(code))) return null;
	const found = ASSIGNMENT.exec(code);
	if (found === null) return null;
	if (found.groups?.["op"] !== undefined) return [];
	const targets = found.groups?.["targets"] ?? "";
	return targets
		.split(",")
		.map((name) => name.trim())
		.filter((name) => /^[A-Za-z_]\w*$/u.test(name));
}

/**
 * Name introduced by a def/class/function header, if any.
 *
 * @pure true
 */
export const definitionName = (code: string): string | null =>
	DEFINITION_NAME.exec(code)?.groups?.["name"] ?? null;

/**
 * True when the line starts a block terminator statement (return, raise, break, continue, throw).
 *
 * @pure true
 */
export const isTerminator = (code: string): boolean =>
	TERMINATORS.has(firstWord(code));

function stripNestedGroups(code: string): string {
	let previous = "";
	let current = code;
	while (previous !== current) {
		previous = current;
		current = current.replace(NESTED_GROUP, "");
	}
	return current;
}

/**
 * True when a complete block header has no `:` outside brackets.
 * Headers ending with `{` or `;` belong to brace languages and are skipped.
 *
 * @pure true
 * @precondition code is a whole logical line (no open brackets, no trailing backslash)
 */
export function lacksBlockColon(code: string): boolean {
	if (!BLOCK_HEADER.test(code)) return false;
	if (/[{;]$/u.test(code)) return false;
	return !stripNestedGroups(code).includes(":");
}

/**
 * True when `;` separates two statements on one line.
 *
 * @pure true
 */
export const hasMultipleStatements = (code: string): boolean =>
	/;\s*\S/u.test(code) && !/^for\s*\(/u.test(code);

/**
 * Number of boolean operators in masked code.
 *
 * @pure true
 */
export const countBooleanOperators = (code: string): number =>
	code.match(BOOLEAN_OPERATOR)?.length ?? 0;

/**
 * Identifier tokens of masked code.
 *
 * @pure true
 */
export const identifiers = (code: string): readonly string[] =>
	code.match(IDENTIFIER) ?? [];
