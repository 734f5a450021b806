// CHANGE: Make main.ts a thin APP delegator
// WHY: main parses CLI arguments and delegates orchestration to app/runCat
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { runCat } from "./app/runCat.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/index.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1)
 *
 * @pure false (delegates to app orchestration), but does not call process.exit
 * @invariant ExitCode ∈ {0,1}
 * @complexity O(1)
 */
export async function main(
	args: readonly string[] = process.argv.slice(2),
): Promise<ExitCode> {
	return runCat(parseCLIArgs(args));
}
