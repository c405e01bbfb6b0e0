// CHANGE: Command line parsing for code-scan
// WHY: Handler map keeps each flag's rule in one place and the parser loop flat
// PURITY: SHELL (reads process.argv by default; parsing itself is pure)
// INVARIANT: Right(options) ∧ ¬options.help → exactly one of targetPath, requestPath is set
// COMPLEXITY: O(n) where n = |args|

import { Either, pipe } from "effect";

import { UsageError } from "../../core/errors.js";
import { isSeverityThreshold } from "../../core/types/index.js";
import type {
	CLIOptions,
	OutputFormat,
	SeverityThreshold,
	WireOptionName,
	WireOptions,
} from "../../core/types/index.js";
import {
	isWireOptionName,
	WIRE_OPTION_NAMES,
} from "../../core/wire/request.js";

export const USAGE = [
	"Usage:",
	"  code-scan <file> [--format pretty|json] [--fail-on <level>] [--config <path>]",
	"                   [--only <option,...>] [--no-<option>...] [--compare <file>] [--verbose]",
	"  code-scan --request <request.json> [--format pretty|json] [--fail-on <level>]",
	"",
	`Options: ${WIRE_OPTION_NAMES.join(", ")}`,
	"Levels: critical, error, warning, info, none",
].join("\n");

type ValueFlag =
	| "--format"
	| "--fail-on"
	| "--config"
	| "--request"
	| "--compare"
	| "--only";

const VALUE_FLAGS: readonly ValueFlag[] = [
	"--format",
	"--fail-on",
	"--config",
	"--request",
	"--compare",
	"--only",
];

interface ParseState {
	readonly positionals: readonly string[];
	readonly values: ReadonlyMap<ValueFlag, string>;
	readonly disabled: readonly WireOptionName[];
	readonly verbose: boolean;
	readonly help: boolean;
}

type Step = Either.Either<readonly [ParseState, number], UsageError>;

const INITIAL_STATE: ParseState = {
	positionals: [],
	values: new Map(),
	disabled: [],
	verbose: false,
	help: false,
};

const usageError = (detail: string): UsageError => new UsageError({ detail });

const consumed = (state: ParseState, count: number): Step =>
	Either.right([state, count]);

const isValueFlag = (arg: string): arg is ValueFlag =>
	VALUE_FLAGS.some((flag) => flag === arg);

const isOutputFormat = (value: string): value is OutputFormat =>
	value === "pretty" || value === "json";

const normalizeOptionName = (name: string): string =>
	name.trim().replaceAll("-", "_");

type SwitchHandler = (state: ParseState) => ParseState;

const switchHandlers: Readonly<Record<string, SwitchHandler | undefined>> = {
	"--verbose": (state) => ({ ...state, verbose: true }),
	"-v": (state) => ({ ...state, verbose: true }),
	"--help": (state) => ({ ...state, help: true }),
	"-h": (state) => ({ ...state, help: true }),
};

function disableOption(state: ParseState, arg: string): Step {
	const name = normalizeOptionName(arg.slice("--no-".length));
	return isWireOptionName(name)
		? consumed({ ...state, disabled: [...state.disabled, name] }, 1)
		: Either.left(usageError(`Unknown option: ${arg}`));
}

function setValue(state: ParseState, flag: ValueFlag, next: string | undefined): Step {
	if (next === undefined) return Either.left(usageError(`${flag} requires a value`));
	const values = new Map(state.values);
	values.set(flag, next);
	return consumed({ ...state, values }, 2);
}

/**
 * Consumes one argument; the step carries the new state and how many arguments were used.
 */
function processArgument(
	state: ParseState,
	arg: string,
	next: string | undefined,
): Step {
	if (isValueFlag(arg)) return setValue(state, arg, next);
	const handler = switchHandlers[arg];
	if (handler !== undefined) return consumed(handler(state), 1);
	if (arg.startsWith("--no-")) return disableOption(state, arg);
	if (arg.startsWith("-")) return Either.left(usageError(`Unknown flag: ${arg}`));
	return consumed({ ...state, positionals: [...state.positionals, arg] }, 1);
}

function scanArguments(
	args: readonly string[],
): Either.Either<ParseState, UsageError> {
	let state = INITIAL_STATE;
	let index = 0;
	while (index < args.length) {
		const step = processArgument(state, args[index] ?? "", args[index + 1]);
		if (Either.isLeft(step)) return Either.left(step.left);
		const [nextState, count] = step.right;
		state = nextState;
		index += count;
	}
	return Either.right(state);
}

type MutableOverrides = { -readonly [K in WireOptionName]?: boolean };

function overrides(
	entries: ReadonlyArray<readonly [WireOptionName, boolean]>,
): Partial<WireOptions> {
	const result: MutableOverrides = {};
	for (const [name, value] of entries) {
		result[name] = value;
	}
	return result;
}

function parseOnly(
	list: string | undefined,
): Either.Either<Partial<WireOptions>, UsageError> {
	if (list === undefined) return Either.right({});
	const names = list.split(",").map(normalizeOptionName);
	const unknownName = names.find((name) => !isWireOptionName(name));
	if (unknownName !== undefined) {
		return Either.left(usageError(`Unknown option in --only: ${unknownName}`));
	}
	return Either.right(
		overrides(
			WIRE_OPTION_NAMES.map((name): readonly [WireOptionName, boolean] => [
				name,
				names.includes(name),
			]),
		),
	);
}

function parseFormat(
	value: string | undefined,
): Either.Either<OutputFormat | undefined, UsageError> {
	if (value === undefined || isOutputFormat(value)) return Either.right(value);
	return Either.left(usageError(`Unknown format: ${value}`));
}

function parseFailOn(
	value: string | undefined,
): Either.Either<SeverityThreshold | undefined, UsageError> {
	if (value === undefined || isSeverityThreshold(value)) {
		return Either.right(value);
	}
	return Either.left(usageError(`Unknown severity level: ${value}`));
}

function checkTargets(state: ParseState): Either.Either<ParseState, UsageError> {
	const hasFile = state.positionals.length > 0;
	const hasRequest = state.values.has("--request");
	if (state.positionals.length > 1) {
		return Either.left(
			usageError(`Unexpected argument: ${state.positionals[1] ?? ""}`),
		);
	}
	if (state.help) return Either.right(state);
	if (hasRequest && hasFile) {
		return Either.left(usageError("Pass either <file> or --request, not both"));
	}
	if (!hasRequest && !hasFile) {
		return Either.left(usageError("Missing <file> or --request <path>"));
	}
	if (state.values.has("--compare") && !hasFile) {
		return Either.left(usageError("--compare needs a <file> to compare against"));
	}
	return Either.right(state);
}

function buildOptions(
	state: ParseState,
	only: Partial<WireOptions>,
	format: OutputFormat | undefined,
	failOn: SeverityThreshold | undefined,
): CLIOptions {
	const targetPath = state.positionals[0];
	const requestPath = state.values.get("--request");
	const comparePath = state.values.get("--compare");
	const configPath = state.values.get("--config");
	return {
		...(targetPath === undefined ? {} : { targetPath }),
		...(requestPath === undefined ? {} : { requestPath }),
		...(comparePath === undefined ? {} : { comparePath }),
		...(configPath === undefined ? {} : { configPath }),
		...(format === undefined ? {} : { format }),
		...(failOn === undefined ? {} : { failOn }),
		optionOverrides: {
			...only,
			...overrides(
				state.disabled.map((name): readonly [WireOptionName, boolean] => [
					name,
					false,
				]),
			),
		},
		verbose: state.verbose,
		help: state.help,
	};
}

/**
 * Parses code-scan arguments.
 *
 * @param args - Arguments after the executable and script path
 * @returns Right(options) or Left(UsageError)
 *
 * @example
 * ```ts
 * parseCLIArgs(["app.py", "--format", "json", "--no-type-hints"])
 * // Right({ targetPath: "app.py", format: "json", optionOverrides: { type_hints: false }, verbose: false, help: false })
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): Either.Either<CLIOptions, UsageError> {
	return pipe(
		scanArguments(args),
		Either.flatMap(checkTargets),
		Either.flatMap((state) =>
			Either.all({
				only: parseOnly(state.values.get("--only")),
				format: parseFormat(state.values.get("--format")),
				failOn: parseFailOn(state.values.get("--fail-on")),
			}).pipe(
				Either.map(({ only, format, failOn }) =>
					buildOptions(state, only, format, failOn),
				),
			),
		),
	);
}
