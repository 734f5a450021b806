// CHANGE: Bound the size of every chunk handed to the engine
// PURITY: CORE
// INVARIANT: concat(sliceIntoChunks(c, n)) = c ∧ ∀ piece: 0 < |piece| ≤ n
// COMPLEXITY: O(|c| / n) views, no copying

/**
 * Split a read into views of at most `size` bytes.
 *
 * @pure true
 * @precondition size ≥ 1
 */
export function sliceIntoChunks(
	chunk: Uint8Array,
	size: number,
): readonly Uint8Array[] {
	if (size < 1) {
		throw new RangeError(`chunk size must be positive, received ${size}`);
	}
	if (chunk.length <= size) return chunk.length === 0 ? [] : [chunk];
	const pieces: Uint8Array[] = [];
	for (let start = 0; start < chunk.length; start += size) {
		pieces.push(chunk.subarray(start, Math.min(start + size, chunk.length)));
	}
	return pieces;
}
