// CHANGE: Parameter list reader for function headers
// PURITY: CORE
// INVARIANT: Receivers (self, cls) and bare separators (*, /) are not parameters
// COMPLEXITY: O(n) where n = |code|

export interface Parameter {
	readonly name: string;
	readonly annotated: boolean;
}

const RECEIVERS: ReadonlySet<string> = new Set(["self", "cls"]);

function splitTopLevel(text: string): readonly string[] {
	const parts: string[] = [];
	let depth = 0;
	let current = "";
	for (const char of text) {
		if (char === "," && depth === 0) {
			parts.push(current);
			current = "";
			continue;
		}
		if ("([{".includes(char)) depth += 1;
		if (")]}".includes(char)) depth -= 1;
		current += char;
	}
	parts.push(current);
	return parts;
}

function parameterListText(code: string): string {
	const open = code.indexOf("(");
	if (open === -1) return "";
	let depth = 0;
	for (let i = open; i < code.length; i += 1) {
		const char = code.charAt(i);
		if (char === "(") depth += 1;
		if (char === ")") depth -= 1;
		if (depth === 0) return code.slice(open + 1, i);
	}
	return code.slice(open + 1);
}

/**
 * Parameters declared on a single-line function header.
 *
 * @pure true
 *
 * @example
 * ```ts
 * parseParameters("def f(self, a: int, b=2, *args):")
 * // => [{ name: "a", annotated: true }, { name: "b", annotated: false }, { name: "args", annotated: false }]
 * ```
 */
export function parseParameters(code: string): readonly Parameter[] {
	return splitTopLevel(parameterListText(code))
		.map((part) => part.trim())
		.map((part) => {
			const declaration = part.split("=")[0] ?? "";
			const [head = "", ...annotation] = declaration.split(":");
			return {
				name: head.replace(/^\*{1,2}/u, "").trim(),
				annotated: annotation.length > 0,
			};
		})
		.filter(
			(parameter) =>
				/^[A-Za-z_]\w*$/u.test(parameter.name) &&
				!RECEIVERS.has(parameter.name),
		);
}

/**
 * @pure true
 */
export const parameterNames = (code: string): readonly string[] =>
	parseParameters(code).map((parameter) => parameter.name);
