// CHANGE: Tagged union of what a command line asks for
// WHY: The parser returns a value; APP decides what to do with it via exhaustive matching
// SOURCE: https://effect.website/docs/data-types/data#taggedenum
// PURITY: CORE
// INVARIANT: Exactly one variant per invocation
// COMPLEXITY: O(1)

import { Data } from "effect";

import type { CatOptions } from "./models.js";

/**
 * Parsed command line.
 *
 * - `Run`: concatenate `files` (empty means standard input) with `options`
 * - `Help` / `Version`: print and exit successfully
 * - `InvalidOption`: unknown flag, as spelled by the user (`x` or `--foo`)
 */
export type CatCommand = Data.TaggedEnum<{
	Run: {
		readonly files: readonly string[];
		readonly options: CatOptions;
	};
	Help: {};
	Version: {};
	InvalidOption: { readonly option: string };
}>;

export const CatCommand = Data.taggedEnum<CatCommand>();
