/** Version reported by `--version`. */
export const VERSION = "1.0.0";

/** Name used as the prefix of every diagnostic. */
export const PROGRAM_NAME = "linecat";
