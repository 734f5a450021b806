// CHANGE: Growable byte accumulator that splits output into line-terminated frames
// WHY: The scanner stays pure by building output in memory; SHELL writes every frame on its own
// PURITY: CORE (mutation local to one scan, never escapes as shared state)
// INVARIANT: frames() returns views in emission order; every closed frame ends with "\n"
// COMPLEXITY: amortized O(1) per byte

const ASCII_ENCODER = new TextEncoder();

/**
 * Output buffer of one scanned chunk.
 *
 * @remarks
 * - @pure false (local mutable builder)
 * - @invariant 0 ≤ frameStart ≤ length ≤ buffer.length
 */
export class FrameBuilder {
	private buffer: Uint8Array;
	private length = 0;
	private frameStart = 0;
	private readonly boundaries: number[] = [];

	constructor(capacityHint: number) {
		this.buffer = new Uint8Array(Math.max(16, capacityHint));
	}

	pushByte(byte: number): void {
		this.reserve(1);
		this.buffer[this.length] = byte;
		this.length += 1;
	}

	/**
	 * Copy `source[start, end)` into the output.
	 */
	pushRange(source: Uint8Array, start: number, end: number): void {
		if (end <= start) return;
		this.reserve(end - start);
		this.buffer.set(source.subarray(start, end), this.length);
		this.length += end - start;
	}

	pushBytes(bytes: Uint8Array): void {
		this.pushRange(bytes, 0, bytes.length);
	}

	/**
	 * Append a string made of ASCII characters only.
	 */
	pushAscii(text: string): void {
		this.pushBytes(ASCII_ENCODER.encode(text));
	}

	/**
	 * Close the current frame after a line terminator.
	 */
	endFrame(): void {
		if (this.length === this.frameStart) return;
		this.boundaries.push(this.length);
		this.frameStart = this.length;
	}

	/**
	 * Closed frames followed by the open one, if it holds any byte.
	 */
	frames(): readonly Uint8Array[] {
		const result: Uint8Array[] = [];
		let start = 0;
		for (const end of this.boundaries) {
			result.push(this.buffer.subarray(start, end));
			start = end;
		}
		if (this.length > start) {
			result.push(this.buffer.subarray(start, this.length));
		}
		return result;
	}

	private reserve(extra: number): void {
		const needed = this.length + extra;
		if (needed <= this.buffer.length) return;
		let capacity = this.buffer.length * 2;
		while (capacity < needed) capacity *= 2;
		const grown = new Uint8Array(capacity);
		grown.set(this.buffer.subarray(0, this.length));
		this.buffer = grown;
	}
}
