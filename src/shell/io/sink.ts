// CHANGE: Frame writer over a Node.js Writable with typed failure
// WHY: Each frame is handed to the sink as its own write so a finished line never waits for the rest of the chunk
// PURITY: SHELL
// EFFECT: Effect<void, CatIoError>
// INVARIANT: Completes only after the last frame's write callback; the first error wins
// COMPLEXITY: O(f) writes where f = |frames|

import type { Writable } from "node:stream";

import { Effect } from "effect";

import { CatIoError } from "../../core/errors.js";

/**
 * Writable side of a run (standard output, a file, an in-memory collector).
 */
export type ByteSink = Writable;

/**
 * Write frames in order and wait until the sink has taken the last one.
 *
 * @pure false (writes to the sink)
 * @effect Effect<void, CatIoError>
 */
export function writeFrames(
	sink: ByteSink,
	frames: readonly Uint8Array[],
): Effect.Effect<void, CatIoError> {
	if (frames.length === 0) return Effect.void;
	return Effect.async<void, CatIoError>((resume) => {
		let settled = false;
		const settle = (error: Error | null | undefined): void => {
			if (settled) return;
			settled = true;
			if (error === null || error === undefined) {
				sink.off("error", onError);
				resume(Effect.void);
				return;
			}
			// A failed write is followed by an "error" event; the once-listener stays to absorb it
			resume(Effect.fail(CatIoError.fromCause(error)));
		};
		function onError(error: Error): void {
			settle(error);
		}
		sink.once("error", onError);

		const last = frames.length - 1;
		frames.forEach((frame, index) => {
			if (index === last) {
				sink.write(frame, settle);
			} else {
				sink.write(frame);
			}
		});

		return Effect.sync(() => {
			sink.off("error", onError);
		});
	});
}
