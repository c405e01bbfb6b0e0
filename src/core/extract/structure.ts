// CHANGE: Structural Extractor producing one LineContext per physical line
// WHY: Rules see lexical facts (masked code, construct tags, nesting) instead of re-parsing text themselves
// FORMAT THEOREM: ∀unit: |extractStructure(unit)| = |splitLines(unit.text)| ∧ ∀i: result[i].lineNumber = i + 1
// PURITY: CORE
// INVARIANT: Never fails; text that no recognizer understands yields no tags
// COMPLEXITY: O(n) where n = total characters

import { splitLines } from "../source/source.js";
import type { Construct, LineContext, SourceUnit } from "../types/index.js";
import { trackBrackets } from "./brackets.js";
import type { BracketFacts } from "./brackets.js";
import { INITIAL_LEX_STATE, maskLine } from "./lexer.js";
import type { LexState, MaskedLine } from "./lexer.js";
import {
	assignmentTargets,
	countBooleanOperators,
	definitionName,
	hasMultipleStatements,
	identifiers,
	isTerminator,
	keywordConstructs,
	lacksBlockColon,
} from "./recognizers.js";

interface LexedLine {
	readonly raw: string;
	readonly masked: MaskedLine;
	readonly code: string;
	readonly startsInString: boolean;
}

type LineKind = "blank" | "comment" | "continuation" | "statement";

interface Indentation {
	readonly width: number;
	readonly level: number;
	readonly mixed: boolean;
}

interface FlowFacts {
	readonly loopDepth: number;
	readonly dead: boolean;
}

function lexAll(rawLines: readonly string[]): {
	readonly lexed: readonly LexedLine[];
	readonly unterminatedTriple: number | null;
} {
	let state: LexState = INITIAL_LEX_STATE;
	let openedAt: number | null = null;
	const lexed = rawLines.map((raw, index) => {
		const startsInString = state.openTriple !== null;
		const masked = maskLine(raw, state);
		if (!startsInString && masked.state.openTriple !== null) openedAt = index;
		state = masked.state;
		return { raw, masked, code: masked.codeText.trim(), startsInString };
	});
	return {
		lexed,
		unterminatedTriple: state.openTriple === null ? null : openedAt,
	};
}

function measureIndentation(raw: string): Indentation {
	const leading = /^[ \t]*/u.exec(raw)?.[0] ?? "";
	const tabs = leading.split("\t").length - 1;
	const spaces = leading.length - tabs;
	return {
		width: spaces + tabs * 4,
		level: tabs + Math.floor(spaces / 4),
		mixed: tabs > 0 && spaces > 0,
	};
}

function classify(
	line: LexedLine,
	index: number,
	brackets: BracketFacts,
	previousContinues: boolean,
): LineKind {
	if (line.raw.trim() === "") return "blank";
	if (line.startsInString || previousContinues) return "continuation";
	if ((brackets.depthAtStart[index] ?? 0) > 0) return "continuation";
	if (line.code === "" && line.masked.comment !== null) return "comment";
	return "statement";
}

function countIdentifiers(lexed: readonly LexedLine[]): ReadonlyMap<string, number> {
	const counts = new Map<string, number>();
	for (const line of lexed) {
		const names = [
			...identifiers(line.masked.codeText),
			...identifiers(line.masked.fieldText),
		];
		for (const name of names) {
			counts.set(name, (counts.get(name) ?? 0) + 1);
		}
	}
	return counts;
}

function boundNames(code: string): readonly string[] {
	const defined = definitionName(code);
	const assigned = assignmentTargets(code) ?? [];
	return defined === null ? assigned : [...assigned, defined];
}

/**
 * Tracks enclosing loops and code after a block terminator, statement by statement.
 * Continuation lines inherit the facts of the statement they continue.
 */
class FlowTracker {
	private readonly loops: number[] = [];
	private deadIndent: number | null = null;
	private current: FlowFacts = { loopDepth: 0, dead: false };

	statement(code: string, width: number, isLoop: boolean): FlowFacts {
		while ((this.loops.at(-1) ?? -1) >= width) this.loops.pop();
		if (this.deadIndent !== null && width < this.deadIndent) {
			this.deadIndent = null;
		}
		this.current = {
			loopDepth: this.loops.length,
			dead: this.deadIndent !== null,
		};
		if (isLoop) this.loops.push(width);
		if (this.deadIndent === null && isTerminator(code)) {
			this.deadIndent = width;
		}
		return this.current;
	}

	continuation(): FlowFacts {
		return this.current;
	}
}

function statementConstructs(
	line: LexedLine,
	endsInsideBrackets: boolean,
	counts: ReadonlyMap<string, number>,
): readonly Construct[] {
	const tags: Construct[] = [...keywordConstructs(line.code)];
	if (assignmentTargets(line.code) !== null) tags.push("assignment");
	const complete = !endsInsideBrackets && !line.code.endsWith("\\");
	if (complete && lacksBlockColon(line.code)) tags.push("missing-colon");
	if (hasMultipleStatements(line.code)) tags.push("multi-statement");
	const unused = boundNames(line.code).some(
		(name) => !name.startsWith("_") && counts.get(name) === 1,
	);
	if (unused) tags.push("unused-binding");
	return tags;
}

function sharedConstructs(
	line: LexedLine,
	index: number,
	brackets: BracketFacts,
	unterminatedTriple: number | null,
): readonly Construct[] {
	const tags: Construct[] = [];
	if (line.masked.hasString) tags.push("literal-string");
	if (line.masked.unterminated || unterminatedTriple === index) {
		tags.push("unterminated-string");
	}
	if (brackets.unbalanced.has(index)) tags.push("unbalanced-bracket");
	if (brackets.unclosed.has(index)) tags.push("unclosed-bracket");
	return tags;
}

function flowConstructs(flow: FlowFacts): readonly Construct[] {
	const tags: Construct[] = [];
	if (flow.loopDepth > 0) tags.push("loop-body");
	if (flow.dead) tags.push("unreachable");
	return tags;
}

/**
 * Extracts per-line structural facts from a source unit.
 *
 * @param source - Validated source unit
 * @returns One LineContext per physical line, in order
 *
 * @pure true
 * @invariant blank lines carry exactly {blank}
 * @invariant result is identical for identical input text
 * @complexity O(n) where n = total characters
 *
 * @example
 * ```ts
 * const [first] = extractStructure({ text: "for x in xs:\n    total += x", filename: null });
 * first.constructs.has("loop") // => true
 * ```
 */
export function extractStructure(source: SourceUnit): readonly LineContext[] {
	const { lexed, unterminatedTriple } = lexAll(splitLines(source.text));
	const brackets = trackBrackets(lexed.map((line) => line.masked.codeText));
	const counts = countIdentifiers(lexed);
	const flow = new FlowTracker();
	let previousContinues = false;

	return lexed.map((line, index): LineContext => {
		const indentation = measureIndentation(line.raw);
		const kind = classify(line, index, brackets, previousContinues);
		const tags = new Set<Construct>();
		const base = {
			lineNumber: index + 1,
			rawText: line.raw,
			codeText: line.masked.codeText,
			indentLevel: indentation.level,
			booleanOperators: countBooleanOperators(line.masked.codeText),
		};
		if (kind === "blank") {
			return { ...base, constructs: new Set<Construct>(["blank"]), loopDepth: 0 };
		}
		previousContinues = line.code.endsWith("\\");
		if (kind === "comment") {
			return { ...base, constructs: new Set<Construct>(["comment"]), loopDepth: 0 };
		}
		const facts =
			kind === "statement"
				? flow.statement(
						line.code,
						indentation.width,
						keywordConstructs(line.code).includes("loop"),
					)
				: flow.continuation();
		if (kind === "statement") {
			const endsInside = (brackets.depthAtEnd[index] ?? 0) > 0;
			statementConstructs(line, endsInside, counts).forEach((tag) => tags.add(tag));
		}
		if (indentation.mixed && !line.startsInString) tags.add("mixed-indentation");
		sharedConstructs(line, index, brackets, unterminatedTriple).forEach((tag) =>
			tags.add(tag),
		);
		flowConstructs(facts).forEach((tag) => tags.add(tag));
		return { ...base, constructs: tags, loopDepth: facts.loopDepth };
	});
}
