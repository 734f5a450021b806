// CHANGE: Per-mode body renderers (verbatim / tab-marking / non-printing escape)
// WHY: Each renderer reports how many input bytes it consumed so the scanner can locate the next terminator
// PURITY: CORE
// INVARIANT: ∀ renderer, start < |chunk| ∧ chunk[start] ∉ stopSet ⇒ consumed ≥ 1
// COMPLEXITY: O(k) where k = consumed bytes

import { match, P } from "ts-pattern";

import type { RenderMode } from "../models.js";
import type { FrameBuilder } from "./frames.js";

export const LF = 0x0a;
export const CR = 0x0d;
export const TAB = 0x09;

const TAB_MARK = new Uint8Array([0x5e, 0x49]); // ^I

/**
 * Signature shared by the three renderers.
 *
 * @returns number of bytes of `chunk` consumed from `start`
 */
export type BodyRenderer = (
	chunk: Uint8Array,
	start: number,
	out: FrameBuilder,
) => number;

/**
 * Index of the first `\n` or `\r` at or after `start`, or `chunk.length`.
 *
 * @pure true
 */
function findLineStop(chunk: Uint8Array, start: number): number {
	for (let i = start; i < chunk.length; i += 1) {
		const byte = chunk[i];
		if (byte === LF || byte === CR) return i;
	}
	return chunk.length;
}

/**
 * Copy bytes unchanged up to the next `\n`, `\r` or the end of the chunk.
 */
export const writeVerbatimToEnd: BodyRenderer = (chunk, start, out) => {
	const stop = findLineStop(chunk, start);
	out.pushRange(chunk, start, stop);
	return stop - start;
};

/**
 * Like {@link writeVerbatimToEnd}, with every TAB written as `^I`.
 */
export const writeTabsToEnd: BodyRenderer = (chunk, start, out) => {
	const stop = findLineStop(chunk, start);
	let runStart = start;
	for (let i = start; i < stop; i += 1) {
		if (chunk[i] === TAB) {
			out.pushRange(chunk, runStart, i);
			out.pushBytes(TAB_MARK);
			runStart = i + 1;
		}
	}
	out.pushRange(chunk, runStart, stop);
	return stop - start;
};

/**
 * Caret / meta notation of a single byte.
 *
 * @param byte - value in [0, 255]
 * @param tab - representation of TAB (`"^I"` or `"\t"`)
 *
 * @pure true
 * @example
 * ```ts
 * escapeByte(0x08, "\t"); // "^H"
 * escapeByte(0xe9, "\t"); // "M-i"
 * ```
 */
export function escapeByte(byte: number, tab: string): string {
	return match(byte)
		.with(TAB, () => tab)
		.with(127, () => "^?")
		.with(255, () => "M-^?")
		.with(
			P.when((b) => b < 32),
			(b) => `^${String.fromCharCode(b + 64)}`,
		)
		.with(
			P.when((b) => b < 127),
			(b) => String.fromCharCode(b),
		)
		.with(
			P.when((b) => b < 160),
			(b) => `M-^${String.fromCharCode(b - 64)}`,
		)
		.otherwise((b) => `M-${String.fromCharCode(b - 128)}`);
}

const ASCII_ENCODER = new TextEncoder();

/**
 * Lookup table of the 256 escapes for one tab representation.
 *
 * @pure true
 * @complexity O(256)
 */
function buildEscapeTable(tab: string): readonly Uint8Array[] {
	return Array.from({ length: 256 }, (_, byte) =>
		ASCII_ENCODER.encode(escapeByte(byte, tab)),
	);
}

const ESCAPES_WITH_LITERAL_TAB = buildEscapeTable("\t");
const ESCAPES_WITH_MARKED_TAB = buildEscapeTable("^I");

/**
 * Build the non-printing renderer for a tab representation.
 *
 * Stops at `\n` only: `\r` is escaped as `^M` like any control byte.
 */
export function nonprintingRenderer(tab: string): BodyRenderer {
	const table = tab === "^I" ? ESCAPES_WITH_MARKED_TAB : ESCAPES_WITH_LITERAL_TAB;
	return (chunk, start, out) => {
		let i = start;
		while (i < chunk.length) {
			const byte = chunk[i];
			if (byte === undefined || byte === LF) break;
			const escaped = table[byte];
			if (escaped !== undefined) out.pushBytes(escaped);
			i += 1;
		}
		return i - start;
	};
}

/**
 * Renderer for a mode.
 *
 * @pure true
 */
export function rendererFor(mode: RenderMode, tab: string): BodyRenderer {
	return match(mode)
		.with("verbatim", () => writeVerbatimToEnd)
		.with("tabs", () => writeTabsToEnd)
		.with("nonprinting", () => nonprintingRenderer(tab))
		.exhaustive();
}
