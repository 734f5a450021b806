// CHANGE: Public API entry point for library consumers
// WHY: Export the APP orchestrator, the engine session and CORE utilities; keep SHELL plumbing internal
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or Effect values
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ORCHESTRATOR (Programmatic Entry Point)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Run a parsed command against explicit process handles.
 *
 * @example
 * ```typescript
 * import { parseCLIArgs, runCat } from "linecat";
 *
 * const exitCode = await runCat(parseCLIArgs(["-n", "notes.txt"]));
 * ```
 *
 * @pure false - Opens files and writes to stdout
 * @returns ExitCode (0 = success, 1 = failure reported on stderr)
 */
export {
	concatenate,
	processContext,
	type RunContext,
	runCat,
	runCatEffect,
} from "./app/runCat.js";
export { parseCLIArgs } from "./shell/config/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE (Effect-based streaming)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Transform byte sources into a writable sink.
 *
 * @example
 * ```typescript
 * import { Effect, pipe } from "effect";
 * import { catSources, defaultOptions, withNumbering } from "linecat";
 *
 * await Effect.runPromise(
 *   catSources([first, second], process.stdout, pipe(defaultOptions, withNumbering("all"))),
 * );
 * ```
 */
export {
	type CatSession,
	cat,
	catSources,
	makeCatSession,
} from "./shell/engine/cat.js";
export { openSource } from "./shell/io/open.js";
export { type ByteSink, writeFrames } from "./shell/io/sink.js";
export { type ByteSource, readChunks } from "./shell/io/source.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE (Immutable Domain Models and Pure Functions)
// ═══════════════════════════════════════════════════════════════════════════════

export { CatCommand } from "./core/command.js";
export { CatIoError, type RunError, SourceNotFound } from "./core/errors.js";
export {
	finishScan,
	formatLineNumber,
	initialEngineState,
	scanChunk,
} from "./core/engine/scanner.js";
export { escapeByte } from "./core/engine/render.js";
export type {
	CatOptions,
	EngineState,
	ExitCode,
	NumberingMode,
	RenderMode,
	ScanResult,
} from "./core/models.js";
export {
	canWriteFast,
	chunkSizeFor,
	defaultOptions,
	endOfLine,
	renderModeOf,
	tabGlyph,
	withNumbering,
	withShowEnds,
	withShowNonprinting,
	withShowTabs,
	withSqueezeBlank,
} from "./core/options.js";
