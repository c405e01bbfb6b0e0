// CHANGE: Bracket depth tracking across lines
// PURITY: CORE
// INVARIANT: depthAtStart[i] ≥ 0 and depthAtEnd[i] ≥ 0 for every line
// COMPLEXITY: O(n) where n = total characters of masked code

const OPENERS = "([{";
const CLOSER_TO_OPENER: Readonly<Record<string, string>> = {
	")": "(",
	"]": "[",
	"}": "{",
};

interface OpenBracket {
	readonly char: string;
	readonly lineIndex: number;
}

/**
 * Bracket facts for a sequence of masked lines (0-based line indexes).
 *
 * @property unbalanced Lines holding a closer with no matching opener
 * @property unclosed Lines holding an opener never closed before end of input
 */
export interface BracketFacts {
	readonly depthAtStart: readonly number[];
	readonly depthAtEnd: readonly number[];
	readonly unbalanced: ReadonlySet<number>;
	readonly unclosed: ReadonlySet<number>;
}

function closeBracket(
	stack: OpenBracket[],
	char: string,
	lineIndex: number,
	unbalanced: Set<number>,
): void {
	const top = stack.at(-1);
	if (top?.char !== CLOSER_TO_OPENER[char]) {
		unbalanced.add(lineIndex);
	}
	stack.pop();
}

/**
 * Scans masked code lines and tracks the bracket stack across line breaks.
 * A mismatched closer still pops the innermost opener so one typo
 * does not cascade into every following line.
 *
 * @pure true
 * @complexity O(n)
 */
export function trackBrackets(codeLines: readonly string[]): BracketFacts {
	const stack: OpenBracket[] = [];
	const depthAtStart: number[] = [];
	const depthAtEnd: number[] = [];
	const unbalanced = new Set<number>();
	codeLines.forEach((code, lineIndex) => {
		depthAtStart.push(stack.length);
		for (const char of code) {
			if (OPENERS.includes(char)) {
				stack.push({ char, lineIndex });
			} else if (char in CLOSER_TO_OPENER) {
				closeBracket(stack, char, lineIndex, unbalanced);
			}
		}
		depthAtEnd.push(stack.length);
	});
	return {
		depthAtStart,
		depthAtEnd,
		unbalanced,
		unclosed: new Set(stack.map((open) => open.lineIndex)),
	};
}
