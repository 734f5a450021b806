// CHANGE: Pure rendering of run failures into one-line diagnostics
// PURITY: CORE
// INVARIANT: Exactly one line per failure, prefixed by the program name
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { RunError } from "../errors.js";
import type { Palette } from "./palette.js";

/**
 * Diagnostic line for a failed run.
 *
 * @pure true
 * @example
 * ```ts
 * renderRunError("linecat", new SourceNotFound({ path: "a.txt" }), plainPalette);
 * // "linecat: a.txt: No such file or directory"
 * ```
 */
export function renderRunError(
	program: string,
	error: RunError,
	palette: Palette,
): string {
	const prefix = `${palette.program(program)}: `;
	return match(error)
		.with(
			{ _tag: "SourceNotFound" },
			(e) =>
				`${prefix}${palette.operand(e.path)}: ${palette.error("No such file or directory")}`,
		)
		.with({ _tag: "CatIo" }, (e) => `${prefix}${palette.error(e.detail)}`)
		.exhaustive();
}
