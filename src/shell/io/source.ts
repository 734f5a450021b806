// CHANGE: Byte sources as async iterables lifted into Effect streams
// WHY: The engine must not know whether a source is a file, standard input or an in-memory fixture
// PURITY: SHELL
// EFFECT: Stream<Uint8Array, CatIoError>
// INVARIANT: ∀ emitted chunk: 0 < |chunk| ≤ chunkSize; bytes keep source order
// COMPLEXITY: O(n) where n = bytes read

import { Stream } from "effect";

import { sliceIntoChunks } from "../../core/engine/chunks.js";
import { CatIoError } from "../../core/errors.js";

/**
 * Readable side of a run. A Node.js `Readable` without an encoding is one.
 */
export type ByteSource = AsyncIterable<Uint8Array>;

/**
 * Stream the bytes of a source in chunks of at most `chunkSize`.
 *
 * @pure false (pulls from the source)
 * @effect Stream<Uint8Array, CatIoError>
 */
export function readChunks(
	source: ByteSource,
	chunkSize: number,
): Stream.Stream<Uint8Array, CatIoError> {
	return Stream.fromAsyncIterable(source, CatIoError.fromCause).pipe(
		Stream.mapConcat((chunk) => sliceIntoChunks(chunk, chunkSize)),
	);
}
