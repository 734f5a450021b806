// CHANGE: Styling seam between pure text builders and terminal colors
// WHY: CORE formats text; SHELL decides whether it is colored
// PURITY: CORE
// INVARIANT: ∀ role: strip(palette[role](s)) = s
// COMPLEXITY: O(1)

/**
 * Styling roles used by usage and diagnostic text.
 */
export interface Palette {
	readonly program: (text: string) => string;
	readonly option: (text: string) => string;
	readonly operand: (text: string) => string;
	readonly error: (text: string) => string;
	readonly heading: (text: string) => string;
}

const identity = (text: string): string => text;

/**
 * Palette that leaves text untouched.
 *
 * @pure true
 */
export const plainPalette: Palette = {
	program: identity,
	option: identity,
	operand: identity,
	error: identity,
	heading: identity,
};
