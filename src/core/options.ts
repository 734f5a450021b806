// CHANGE: Immutable option record with dual setters and derived queries
// WHY: Options are resolved once per invocation and read by every run without mutation
// SOURCE: https://effect.website/docs/code-style/dual
// FORMAT THEOREM: ∀o: canWriteFast(o) ↔ renderModeOf(o) = "verbatim" ∧ ¬o.showEnds ∧ ¬o.squeezeBlank ∧ o.numbering = "none"
// PURITY: CORE
// INVARIANT: Each setter changes exactly one field and returns a new record
// COMPLEXITY: O(1)

import { dual } from "effect/Function";

import {
	type CatOptions,
	FAST_COPY_CHUNK_SIZE,
	LINE_SCAN_CHUNK_SIZE,
	type NumberingMode,
	type RenderMode,
} from "./models.js";

/**
 * All annotations disabled.
 *
 * @pure true
 */
export const defaultOptions: CatOptions = {
	numbering: "none",
	showEnds: false,
	squeezeBlank: false,
	showTabs: false,
	showNonprinting: false,
};

type Setter<A> = {
	(value: A): (self: CatOptions) => CatOptions;
	(self: CatOptions, value: A): CatOptions;
};

const setter = <K extends keyof CatOptions>(key: K): Setter<CatOptions[K]> =>
	dual<
		(value: CatOptions[K]) => (self: CatOptions) => CatOptions,
		(self: CatOptions, value: CatOptions[K]) => CatOptions
	>(
		2,
		(self: CatOptions, value: CatOptions[K]): CatOptions => ({
			...self,
			[key]: value,
		}),
	);

/**
 * @example
 * ```ts
 * pipe(defaultOptions, withNumbering("all"), withShowEnds(true));
 * withNumbering(defaultOptions, "nonempty");
 * ```
 */
export const withNumbering: Setter<NumberingMode> = setter("numbering");
export const withShowEnds: Setter<boolean> = setter("showEnds");
export const withSqueezeBlank: Setter<boolean> = setter("squeezeBlank");
export const withShowTabs: Setter<boolean> = setter("showTabs");
export const withShowNonprinting: Setter<boolean> = setter("showNonprinting");

/**
 * True when the input can be copied to the output byte for byte.
 *
 * Any enabled annotation forces the stateful scan.
 *
 * @pure true
 * @complexity O(1)
 */
export function canWriteFast(options: CatOptions): boolean {
	return !(
		options.showTabs ||
		options.showNonprinting ||
		options.showEnds ||
		options.squeezeBlank ||
		options.numbering !== "none"
	);
}

/**
 * Representation of a horizontal tab in non-printing mode.
 *
 * @pure true
 */
export function tabGlyph(options: CatOptions): string {
	return options.showTabs ? "^I" : "\t";
}

/**
 * Bytes written for a line terminator.
 *
 * @pure true
 */
export function endOfLine(options: CatOptions): string {
	return options.showEnds ? "$\n" : "\n";
}

/**
 * Body rendering routine; non-printing escape supersedes tab marking.
 *
 * @pure true
 */
export function renderModeOf(options: CatOptions): RenderMode {
	if (options.showNonprinting) return "nonprinting";
	if (options.showTabs) return "tabs";
	return "verbatim";
}

/**
 * Read size suited to the path the options select.
 *
 * @pure true
 */
export function chunkSizeFor(options: CatOptions): number {
	return canWriteFast(options) ? FAST_COPY_CHUNK_SIZE : LINE_SCAN_CHUNK_SIZE;
}
