// CHANGE: Source unit and per-line structural facts
// PURITY: CORE
// INVARIANT: lines[i].lineNumber = i + 1 for every extracted sequence
// COMPLEXITY: O(1) - type declarations only

/**
 * A unit of source text handed to the analyzer.
 * Ownership stays with the caller; the core never persists it.
 */
export interface SourceUnit {
	readonly text: string;
	readonly filename: string | null;
}

/**
 * Lexical construct tags recognised by the structural extractor.
 */
export type Construct =
	| "blank"
	| "comment"
	| "assignment"
	| "function-def"
	| "class-def"
	| "loop"
	| "conditional"
	| "exception-handler"
	| "bare-except"
	| "literal-string"
	| "decorator"
	| "return"
	| "import"
	| "global-decl"
	| "missing-colon"
	| "unterminated-string"
	| "unbalanced-bracket"
	| "unclosed-bracket"
	| "mixed-indentation"
	| "unreachable"
	| "unused-binding"
	| "loop-body"
	| "multi-statement";

/**
 * Structural facts for one physical line.
 *
 * @property lineNumber 1-based line number
 * @property rawText Line exactly as written (without the line terminator)
 * @property codeText rawText with comments removed and string contents blanked
 * @property constructs Tags produced by the extractor; empty when nothing is recognised
 * @property indentLevel Leading indentation in levels (tab = 1, four spaces = 1)
 * @property booleanOperators Count of and/or/&&/|| operators in codeText
 * @property loopDepth Number of enclosing loop headers (the header itself excluded)
 */
export interface LineContext {
	readonly lineNumber: number;
	readonly rawText: string;
	readonly codeText: string;
	readonly constructs: ReadonlySet<Construct>;
	readonly indentLevel: number;
	readonly booleanOperators: number;
	readonly loopDepth: number;
}
