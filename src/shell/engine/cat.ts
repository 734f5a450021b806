// CHANGE: Engine session driving the pure scanner over streamed sources
// WHY: Line numbers, squeeze state and a deferred "\r" must carry over between the sources of one concatenation
// FORMAT THEOREM: ∀ sources s1..sn: catSources([s1..sn]) ≡ cat(s1 ++ … ++ sn)
// PURITY: SHELL
// EFFECT: Effect<void, CatIoError>
// INVARIANT: One session owns one EngineState; sources are fed strictly in order
// COMPLEXITY: O(n) where n = total input bytes

import { Effect, Ref, Stream } from "effect";

import { finishScan, initialEngineState, scanChunk } from "../../core/engine/scanner.js";
import type { CatIoError } from "../../core/errors.js";
import type { CatOptions } from "../../core/models.js";
import { canWriteFast, chunkSizeFor } from "../../core/options.js";
import { type ByteSink, writeFrames } from "../io/sink.js";
import { type ByteSource, readChunks } from "../io/source.js";

/**
 * One logical run over consecutive sources sharing one output.
 */
export interface CatSession {
	/** Transform and forward every byte of `source`. */
	readonly feed: (source: ByteSource) => Effect.Effect<void, CatIoError>;
	/** Flush what end of input resolves. Call once, after the last feed. */
	readonly finish: Effect.Effect<void, CatIoError>;
}

/**
 * Verbatim copy: no line semantics at all.
 */
function fastSession(sink: ByteSink, chunkSize: number): CatSession {
	return {
		feed: (source) =>
			readChunks(source, chunkSize).pipe(
				Stream.runForEach((chunk) => writeFrames(sink, [chunk])),
			),
		finish: Effect.void,
	};
}

function lineSession(
	options: CatOptions,
	sink: ByteSink,
	chunkSize: number,
): Effect.Effect<CatSession> {
	return Effect.map(Ref.make(initialEngineState), (state) => ({
		feed: (source) =>
			readChunks(source, chunkSize).pipe(
				Stream.runForEach((chunk) =>
					Ref.modify(state, (current) => {
						const result = scanChunk(options, current, chunk);
						return [result.frames, result.state];
					}).pipe(Effect.flatMap((frames) => writeFrames(sink, frames))),
				),
			),
		finish: Ref.modify(state, (current) => {
			const result = finishScan(options, current);
			return [result.frames, result.state];
		}).pipe(Effect.flatMap((frames) => writeFrames(sink, frames))),
	}));
}

/**
 * Start a session with a fresh engine state.
 *
 * @pure false (allocates the state reference)
 * @effect Effect<CatSession>
 */
export function makeCatSession(
	options: CatOptions,
	sink: ByteSink,
): Effect.Effect<CatSession> {
	const chunkSize = chunkSizeFor(options);
	return canWriteFast(options)
		? Effect.succeed(fastSession(sink, chunkSize))
		: lineSession(options, sink, chunkSize);
}

/**
 * Concatenate sources in order into `sink`.
 *
 * The first failure aborts the run; bytes already written stay written.
 *
 * @example
 * ```ts
 * await Effect.runPromise(catSources([a, b], process.stdout, withNumbering(defaultOptions, "all")));
 * ```
 */
export function catSources(
	sources: Iterable<ByteSource>,
	sink: ByteSink,
	options: CatOptions,
): Effect.Effect<void, CatIoError> {
	return Effect.gen(function* () {
		const session = yield* makeCatSession(options, sink);
		for (const source of sources) {
			yield* session.feed(source);
		}
		yield* session.finish;
	});
}

/**
 * Transform one source into `sink`.
 */
export function cat(
	source: ByteSource,
	sink: ByteSink,
	options: CatOptions,
): Effect.Effect<void, CatIoError> {
	return catSources([source], sink, options);
}
