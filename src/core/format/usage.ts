// CHANGE: Pure builders for help, version and invalid-option text
// WHY: SHELL only prints; the text itself is deterministic and testable uncolored
// PURITY: CORE
// INVARIANT: No side effects; output is a function of (program, palette)
// COMPLEXITY: O(1)

import type { Palette } from "./palette.js";

const OPTION_TABLE = `With no FILE, or when FILE is -, read standard input.

    -A, --show-all           equivalent to -vET
    -b, --number-nonblank    number nonempty output lines, overrides -n
    -e                       equivalent to -vE
    -E, --show-ends          display $ at end of each line
    -n, --number             number all output lines
    -s, --squeeze-blank      suppress repeated empty output lines
    -t                       equivalent to -vT
    -T, --show-tabs          display TAB characters as ^I
    -u                       (ignored)
    -v, --show-nonprinting   use ^ and M- notation, except for LFD and TAB
        --help               display this help and exit
        --version            output version information and exit`;

/**
 * Full `--help` text, without a trailing newline.
 *
 * @pure true
 */
export function renderUsage(program: string, palette: Palette): string {
	const name = palette.program(program);
	return [
		"",
		`${palette.heading("Usage:")} ${name} ${palette.option("[OPTION]...")} ${palette.operand("[FILE]...")}`,
		"",
		OPTION_TABLE,
		"",
		palette.heading("Examples:"),
		`    ${name} f - g  Output f's contents, then standard input, then g's contents.`,
		`    ${name}        Copy standard input to standard output.`,
	].join("\n");
}

/**
 * `--version` line.
 *
 * @pure true
 * @example
 * ```ts
 * renderVersion("linecat", "1.0.0", plainPalette); // "linecat v1.0.0"
 * ```
 */
export function renderVersion(
	program: string,
	version: string,
	palette: Palette,
): string {
	return `${palette.program(program)} v${version}`;
}

/**
 * Two-line diagnostic for an unknown option.
 *
 * Short options are quoted by letter, long ones by their whole spelling.
 *
 * @pure true
 */
export function renderInvalidOption(
	program: string,
	option: string,
	palette: Palette,
): string {
	const problem = option.startsWith("--")
		? `${palette.error("unrecognized option '")}${palette.option(option)}${palette.error("'")}`
		: `${palette.error("invalid option -- '")}${palette.option(option)}${palette.error("'")}`;
	return [
		`${palette.program(program)}: ${problem}`,
		`Try '${palette.program(`${program} --help`)}' for more information.`,
	].join("\n");
}
