// CHANGE: Pure annotated line scanner threaded through chunks by an explicit EngineState
// WHY: Output must not depend on how the input is split into reads, so every cross-chunk fact lives in the state
// FORMAT THEOREM: ∀ bytes, ∀ splits s1·s2·…·sn = bytes: concat(scan(s1..sn)) ++ finish = scan(bytes) ++ finish
// PURITY: CORE
// INVARIANT: The input state is never mutated; a new state is returned per chunk
// COMPLEXITY: O(n) time / O(n) space where n = |chunk|

import type { CatOptions, EngineState, ScanResult } from "../models.js";
import { LINE_NUMBER_WIDTH } from "../models.js";
import { endOfLine, renderModeOf, tabGlyph } from "../options.js";
import { FrameBuilder } from "./frames.js";
import { type BodyRenderer, CR, LF, rendererFor } from "./render.js";

type MutableEngineState = { -readonly [K in keyof EngineState]: EngineState[K] };

/**
 * State of a fresh session: line start, nothing numbered, nothing deferred.
 *
 * @pure true
 */
export const initialEngineState: EngineState = {
	lineNumber: 0,
	atLineStart: true,
	pendingCarriageReturn: false,
	blankLineEmitted: false,
};

/**
 * Right-justified line-number field followed by a TAB.
 *
 * @pure true
 * @example
 * ```ts
 * formatLineNumber(12); // "    12\t"
 * ```
 */
export function formatLineNumber(lineNumber: number): string {
	return `${String(lineNumber).padStart(LINE_NUMBER_WIDTH, " ")}\t`;
}

interface ScanContext {
	readonly options: CatOptions;
	readonly render: BodyRenderer;
	readonly defersCarriageReturn: boolean;
	readonly endOfLine: string;
	readonly out: FrameBuilder;
	readonly state: MutableEngineState;
}

function numberLine(ctx: ScanContext): void {
	ctx.state.lineNumber += 1;
	ctx.out.pushAscii(formatLineNumber(ctx.state.lineNumber));
}

/**
 * A deferred `\r` that is not followed by `\n` is plain line content.
 */
function releaseCarriageReturn(ctx: ScanContext): void {
	if (!ctx.state.pendingCarriageReturn) return;
	ctx.out.pushByte(CR);
	ctx.state.pendingCarriageReturn = false;
}

function beginLine(ctx: ScanContext): void {
	ctx.state.atLineStart = false;
	ctx.state.blankLineEmitted = false;
	if (ctx.options.numbering !== "none") numberLine(ctx);
}

/**
 * Handle a `\n`: resolve the deferred `\r`, apply blank-line rules, close the frame.
 */
function terminateLine(ctx: ScanContext): void {
	const { state, options, out } = ctx;
	if (state.pendingCarriageReturn) {
		out.pushAscii(options.showEnds ? "^M" : "\r");
		state.pendingCarriageReturn = false;
	}
	if (state.atLineStart) {
		if (options.squeezeBlank && state.blankLineEmitted) return;
		state.blankLineEmitted = true;
		if (options.numbering === "all") numberLine(ctx);
	}
	out.pushAscii(ctx.endOfLine);
	out.endFrame();
	state.atLineStart = true;
}

function contextFor(
	options: CatOptions,
	state: EngineState,
	capacityHint: number,
): ScanContext {
	const mode = renderModeOf(options);
	return {
		options,
		render: rendererFor(mode, tabGlyph(options)),
		defersCarriageReturn: mode !== "nonprinting",
		endOfLine: endOfLine(options),
		out: new FrameBuilder(capacityHint),
		state: { ...state },
	};
}

/**
 * Scan one chunk of input on the annotated path.
 *
 * @param options - resolved options; must not satisfy `canWriteFast` for the output to be meaningful
 * @param state - state left by the previous chunk (or {@link initialEngineState})
 * @param chunk - next bytes of the logical input
 *
 * @pure true
 * @invariant numbering prefixes are emitted at most once per line
 * @complexity O(|chunk|)
 *
 * @example
 * ```ts
 * const opts = withNumbering(defaultOptions, "all");
 * const { frames } = scanChunk(opts, initialEngineState, bytes("a\nb\n"));
 * // frames: ["     1\ta\n", "     2\tb\n"]
 * ```
 */
export function scanChunk(
	options: CatOptions,
	state: EngineState,
	chunk: Uint8Array,
): ScanResult {
	const ctx = contextFor(options, state, chunk.length * 2 + 16);
	let pos = 0;
	while (pos < chunk.length) {
		const byte = chunk[pos];
		if (byte === LF) {
			terminateLine(ctx);
			pos += 1;
			continue;
		}
		releaseCarriageReturn(ctx);
		if (ctx.state.atLineStart) beginLine(ctx);
		if (byte === CR && ctx.defersCarriageReturn) {
			ctx.state.pendingCarriageReturn = true;
			pos += 1;
			continue;
		}
		pos += ctx.render(chunk, pos, ctx.out);
	}
	return { state: ctx.state, frames: ctx.out.frames() };
}

/**
 * Flush what the end of input resolves: a trailing `\r` is literal content.
 *
 * @pure true
 * @postcondition result.state.pendingCarriageReturn = false
 */
export function finishScan(options: CatOptions, state: EngineState): ScanResult {
	const ctx = contextFor(options, state, 1);
	releaseCarriageReturn(ctx);
	return { state: ctx.state, frames: ctx.out.frames() };
}
