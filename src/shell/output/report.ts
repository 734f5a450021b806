// CHANGE: Console reporting of help, version and failures with terminal colors
// WHY: CORE renders text against a Palette; only this module touches the console
// PURITY: SHELL
// INVARIANT: Help and version go to stdout, diagnostics to stderr
// COMPLEXITY: O(1)

import pc from "picocolors";

import type { RunError } from "../../core/errors.js";
import { renderRunError } from "../../core/format/messages.js";
import type { Palette } from "../../core/format/palette.js";
import {
	renderInvalidOption,
	renderUsage,
	renderVersion,
} from "../../core/format/usage.js";
import { PROGRAM_NAME, VERSION } from "../../core/version.js";

/**
 * Palette backed by picocolors; colors are dropped when the terminal or
 * `NO_COLOR` asks for it.
 */
export const terminalPalette: Palette = {
	program: pc.greenBright,
	option: pc.blueBright,
	operand: pc.yellowBright,
	error: pc.redBright,
	heading: (text) => pc.bold(pc.underline(text)),
};

export function printUsage(palette: Palette = terminalPalette): void {
	console.log(renderUsage(PROGRAM_NAME, palette));
}

export function printVersion(palette: Palette = terminalPalette): void {
	console.log(renderVersion(PROGRAM_NAME, VERSION, palette));
}

export function printInvalidOption(
	option: string,
	palette: Palette = terminalPalette,
): void {
	console.error(renderInvalidOption(PROGRAM_NAME, option, palette));
}

export function printRunError(
	error: RunError,
	palette: Palette = terminalPalette,
): void {
	console.error(renderRunError(PROGRAM_NAME, error, palette));
}
