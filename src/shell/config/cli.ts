// CHANGE: Command-line parsing into a typed CatCommand
// WHY: APP receives a value, never raw argv; help/version/invalid options are variants, not exits
// FORMAT THEOREM: ∀ args: parseCLIArgs(args) ∈ {Run, Help, Version, InvalidOption}
// PURITY: SHELL (reads process.argv by default only)
// INVARIANT: Operands keep their command-line order
// COMPLEXITY: O(n) where n = total length of args

import { flow, identity } from "effect/Function";
import { match } from "ts-pattern";

import { CatCommand } from "../../core/command.js";
import type { CatOptions } from "../../core/models.js";
import { STDIN_OPERAND } from "../../core/models.js";
import {
	defaultOptions,
	withNumbering,
	withShowEnds,
	withShowNonprinting,
	withShowTabs,
	withSqueezeBlank,
} from "../../core/options.js";

type OptionUpdate = (options: CatOptions) => CatOptions;

// Result of one argument: either updated options or a command that ends parsing
type FlagOutcome =
	| { readonly _tag: "Options"; readonly options: CatOptions }
	| CatCommand;

const showAll: OptionUpdate = flow(
	withShowNonprinting(true),
	withShowEnds(true),
	withShowTabs(true),
);

// -n never overrides -b, whatever their order
const numberAll: OptionUpdate = (options) =>
	options.numbering === "none" ? withNumbering(options, "all") : options;

const numberNonblank: OptionUpdate = withNumbering("nonempty");

const shortFlags: Readonly<Record<string, OptionUpdate>> = {
	A: showAll,
	b: numberNonblank,
	e: flow(withShowNonprinting(true), withShowEnds(true)),
	E: withShowEnds(true),
	n: numberAll,
	s: withSqueezeBlank(true),
	t: flow(withShowNonprinting(true), withShowTabs(true)),
	T: withShowTabs(true),
	u: identity,
	v: withShowNonprinting(true),
};

const longFlags: Readonly<Record<string, OptionUpdate>> = {
	"--show-all": showAll,
	"--number-nonblank": numberNonblank,
	"--show-ends": withShowEnds(true),
	"--number": numberAll,
	"--squeeze-blank": withSqueezeBlank(true),
	"--show-tabs": withShowTabs(true),
	"--show-nonprinting": withShowNonprinting(true),
};

function lookup(
	table: Readonly<Record<string, OptionUpdate>>,
	key: string,
): OptionUpdate | undefined {
	return Object.hasOwn(table, key) ? table[key] : undefined;
}

function applyLongFlag(arg: string, options: CatOptions): FlagOutcome {
	return match(arg)
		.with("--help", () => CatCommand.Help())
		.with("--version", () => CatCommand.Version())
		.otherwise((flag): FlagOutcome => {
			const update = lookup(longFlags, flag);
			return update === undefined
				? CatCommand.InvalidOption({ option: flag })
				: { _tag: "Options", options: update(options) };
		});
}

/**
 * Apply a cluster of short flags such as `-nET`, left to right.
 */
function applyShortFlags(arg: string, options: CatOptions): FlagOutcome {
	let current = options;
	for (const letter of arg.slice(1)) {
		const update = lookup(shortFlags, letter);
		if (update === undefined) return CatCommand.InvalidOption({ option: letter });
		current = update(current);
	}
	return { _tag: "Options", options: current };
}

function isOption(arg: string): boolean {
	return arg.startsWith("-") && arg !== STDIN_OPERAND;
}

/**
 * Parse command-line arguments.
 *
 * The first `--help`, `--version` or unknown option in argument order
 * decides the command; `--` makes every later argument an operand.
 *
 * @param args - arguments without the node binary and script path
 * @returns parsed command
 *
 * @example
 * ```ts
 * parseCLIArgs(["-nE", "a.txt", "-"]);
 * // Run { files: ["a.txt", "-"], options: { numbering: "all", showEnds: true, ... } }
 * ```
 */
export function parseCLIArgs(
	args: readonly string[] = process.argv.slice(2),
): CatCommand {
	let options = defaultOptions;
	const files: string[] = [];
	let optionsEnded = false;

	for (const arg of args) {
		if (optionsEnded || !isOption(arg)) {
			files.push(arg);
			continue;
		}
		if (arg === "--") {
			optionsEnded = true;
			continue;
		}
		const outcome = arg.startsWith("--")
			? applyLongFlag(arg, options)
			: applyShortFlags(arg, options);
		if (outcome._tag !== "Options") return outcome;
		options = outcome.options;
	}

	return CatCommand.Run({ files, options });
}
