// CHANGE: Typed domain error ADT for the engine and its source opener using Effect.Data
// WHY: Failures travel in the E channel of Effect signatures instead of thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Read or write failure during a run.
 *
 * The engine does not say which side failed; `code` carries the errno
 * code when the underlying fault had one.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class CatIoError extends Data.TaggedError("CatIo")<{
	readonly detail: string;
	readonly code?: string;
}> {
	/**
	 * Wrap whatever a stream, a promise or a callback rejected with.
	 *
	 * @pure true
	 * @complexity O(1)
	 */
	static fromCause(cause: unknown): CatIoError {
		if (cause instanceof CatIoError) return cause;
		if (cause instanceof Error) {
			const code = errnoCode(cause);
			const detail = cause.message.length > 0 ? cause.message : "I/O error";
			return code === undefined
				? new CatIoError({ detail })
				: new CatIoError({ detail, code });
		}
		return new CatIoError({ detail: String(cause) || "I/O error" });
	}
}

/**
 * A named source does not exist.
 *
 * Raised by the source opener only; the engine never produces it.
 *
 * @pure true (Data class)
 * @invariant path.length > 0
 * @complexity O(1)
 */
export class SourceNotFound extends Data.TaggedError("SourceNotFound")<{
	readonly path: string;
}> {}

/**
 * Union of every failure a run can end with.
 *
 * @pure true
 */
export type RunError = CatIoError | SourceNotFound;

/**
 * Extract a Node.js errno code (`ENOENT`, `EPIPE`, ...) from an error.
 *
 * @pure true
 * @complexity O(1)
 */
export function errnoCode(error: Error): string | undefined {
	if ("code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
