// CHANGE: Line-oriented lexer that masks string literals and comments
// WHY: Recognizers and rules must not fire on text inside strings or comments
// FORMAT THEOREM: ∀line, state: maskLine(line, state).codeText contains no string contents and no comment text
// PURITY: CORE
// INVARIANT: Total function; malformed quoting yields `unterminated = true`, never an exception
// COMPLEXITY: O(n) where n = |line|

/**
 * Lexer state carried from one physical line to the next.
 *
 * @property openTriple Delimiter of a triple-quoted string still open at end of line
 */
export interface LexState {
	readonly openTriple: '"""' | "'''" | null;
}

export const INITIAL_LEX_STATE: LexState = { openTriple: null };

/**
 * Result of masking one line.
 *
 * @property codeText Line with comments dropped and string contents removed (quotes kept)
 * @property comment Comment text including its marker, or null
 * @property hasString True when the line touches any string literal
 * @property unterminated True when a single-quoted literal is not closed on the line
 * @property fieldText Expressions of f-string replacement fields, space separated; masked out of codeText
 */
export interface MaskedLine {
	readonly codeText: string;
	readonly fieldText: string;
	readonly comment: string | null;
	readonly hasString: boolean;
	readonly unterminated: boolean;
	readonly state: LexState;
}

interface Cursor {
	code: string;
	index: number;
	hasString: boolean;
	unterminated: boolean;
	openTriple: '"""' | "'''" | null;
	comment: string | null;
	fields: string[];
}

const TRIPLES = ['"""', "'''"] as const;

function tripleAt(line: string, index: number): '"""' | "'''" | null {
	return TRIPLES.find((t) => line.startsWith(t, index)) ?? null;
}

/**
 * Consumes the body of an open triple-quoted string.
 *
 * @complexity O(k) where k = consumed characters
 */
function consumeTriple(line: string, cursor: Cursor): void {
	const delimiter = cursor.openTriple;
	if (delimiter === null) return;
	const close = line.indexOf(delimiter, cursor.index);
	cursor.hasString = true;
	if (close === -1) {
		cursor.index = line.length;
		return;
	}
	cursor.code += delimiter;
	cursor.index = close + delimiter.length;
	cursor.openTriple = null;
}

const FORMATTED_PREFIX = /(?:^|\W)([rRbBuUfF]{1,2})$/u;
const REPLACEMENT_FIELD = /\{([^{}]*)\}/gu;
// `!r` conversion and `:spec` suffix; a colon inside brackets belongs to the expression
const FIELD_SUFFIX = /(?:![rsa])?(?::[^[\]()]*)?$/u;

const isFormatted = (line: string, quoteIndex: number): boolean =>
	/[fF]/u.test(FORMATTED_PREFIX.exec(line.slice(0, quoteIndex))?.[1] ?? "");

/**
 * Expressions of the replacement fields in an f-string body; `{{` and `}}` are literal braces.
 *
 * @pure true
 * @complexity O(k) where k = |body|
 */
export function replacementFields(body: string): readonly string[] {
	const unescaped = body.replaceAll("{{", "  ").replaceAll("}}", "  ");
	return Array.from(unescaped.matchAll(REPLACEMENT_FIELD), (found) =>
		(found[1] ?? "").replace(FIELD_SUFFIX, "").trim(),
	).filter((field) => field !== "");
}

/**
 * Consumes a single-line string literal starting at cursor.index.
 *
 * @complexity O(k) where k = literal length
 */
function consumeQuoted(line: string, cursor: Cursor, quote: string): void {
	const start = cursor.index + 1;
	const collect = (end: number): void => {
		if (isFormatted(line, cursor.index)) {
			cursor.fields.push(...replacementFields(line.slice(start, end)));
		}
	};
	let i = start;
	while (i < line.length) {
		const ch = line.charAt(i);
		if (ch === "\\") {
			i += 2;
			continue;
		}
		if (ch === quote) {
			collect(i);
			cursor.code += `${quote}${quote}`;
			cursor.index = i + 1;
			cursor.hasString = true;
			return;
		}
		i += 1;
	}
	collect(line.length);
	cursor.code += `${quote}${quote}`;
	cursor.index = line.length;
	cursor.hasString = true;
	cursor.unterminated = true;
}

function isCommentStart(line: string, index: number): boolean {
	if (line.charAt(index) === "#") return true;
	// `//` is floor division in Python; only a leading `//` is a comment
	return line.startsWith("//", index) && line.slice(0, index).trim() === "";
}

/**
 * Advances the cursor by one lexical step.
 *
 * @complexity O(k) where k = consumed characters
 */
function step(line: string, cursor: Cursor): void {
	const ch = line.charAt(cursor.index);
	if (isCommentStart(line, cursor.index)) {
		cursor.comment = line.slice(cursor.index);
		cursor.index = line.length;
		return;
	}
	const triple = tripleAt(line, cursor.index);
	if (triple !== null) {
		cursor.code += triple;
		cursor.openTriple = triple;
		cursor.index += triple.length;
		consumeTriple(line, cursor);
		return;
	}
	if (ch === '"' || ch === "'" || ch === "`") {
		consumeQuoted(line, cursor, ch);
		return;
	}
	cursor.code += ch;
	cursor.index += 1;
}

/**
 * Masks strings and comments in one physical line.
 *
 * @pure true
 * @invariant state.openTriple ≠ null → the whole line up to the closing delimiter is string content
 * @complexity O(n) where n = |line|
 *
 * @example
 * ```ts
 * maskLine('token = "abc"  # note', INITIAL_LEX_STATE).codeText
 * // => 'token = ""  '
 * ```
 */
export function maskLine(line: string, state: LexState): MaskedLine {
	const cursor: Cursor = {
		code: "",
		index: 0,
		hasString: false,
		unterminated: false,
		openTriple: state.openTriple,
		comment: null,
		fields: [],
	};
	consumeTriple(line, cursor);
	while (cursor.index < line.length) {
		step(line, cursor);
	}
	return {
		codeText: cursor.code,
		fieldText: cursor.fields.join(" "),
		comment: cursor.comment,
		hasString: cursor.hasString,
		unterminated: cursor.unterminated,
		state: { openTriple: cursor.openTriple },
	};
}
