// CHANGE: Functional Core domain models for the concatenation engine
// WHY: CORE holds only immutable types and constants; SHELL and APP depend on them, never the reverse
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the linecat process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Which output lines receive a line-number prefix.
 *
 * - `none`: no numbering
 * - `nonempty`: only lines with at least one content byte
 * - `all`: every line, blank lines included
 */
export type NumberingMode = "none" | "nonempty" | "all";

/**
 * Fully resolved formatting options of one invocation.
 *
 * @remarks
 * - @pure true
 * - @invariant never mutated after construction; shared read-only by every run
 */
export interface CatOptions {
	readonly numbering: NumberingMode;
	readonly showEnds: boolean;
	readonly squeezeBlank: boolean;
	readonly showTabs: boolean;
	readonly showNonprinting: boolean;
}

/**
 * Body-byte rendering routine selected by the options.
 *
 * Precedence: `nonprinting` > `tabs` > `verbatim`.
 */
export type RenderMode = "verbatim" | "tabs" | "nonprinting";

/**
 * Cross-chunk state of the annotated scanner.
 *
 * @remarks
 * - @pure true
 * - @invariant pendingCarriageReturn → ¬atLineStart
 * - @invariant lineNumber is monotonically non-decreasing within one session
 */
export interface EngineState {
	/** Count of numbered lines emitted so far */
	readonly lineNumber: number;
	/** Whether the next byte begins a new output line */
	readonly atLineStart: boolean;
	/** A `\r` was read and waits for the byte after it */
	readonly pendingCarriageReturn: boolean;
	/** The most recent output line was blank */
	readonly blankLineEmitted: boolean;
}

/**
 * Output of scanning one chunk.
 *
 * Every frame except possibly the last ends right after a line terminator.
 */
export interface ScanResult {
	readonly state: EngineState;
	readonly frames: readonly Uint8Array[];
}

/** Read size of the verbatim copy. */
export const FAST_COPY_CHUNK_SIZE = 64 * 1024;

/** Read size of the annotated scan. */
export const LINE_SCAN_CHUNK_SIZE = 31 * 1024;

/** Width of the right-justified line-number field. */
export const LINE_NUMBER_WIDTH = 6;

/** Operand naming standard input. */
export const STDIN_OPERAND = "-";
