// CHANGE: Application layer composing the parsed command, the engine session and the reporters
// WHY: APP turns every outcome into an ExitCode value; only the bin entry terminates the process
// PURITY: APP (no process.exit)
// EFFECT: Effect<ExitCode>
// INVARIANT: The first failing source stops the run; earlier output stays written
// COMPLEXITY: O(n) where n = total input bytes

import { Effect } from "effect";
import { match } from "ts-pattern";

import type { CatCommand } from "../core/command.js";
import type { CatIoError, SourceNotFound } from "../core/errors.js";
import type { CatOptions, ExitCode } from "../core/models.js";
import { STDIN_OPERAND } from "../core/models.js";
import { makeCatSession } from "../shell/engine/cat.js";
import { openSource } from "../shell/io/open.js";
import type { ByteSink } from "../shell/io/sink.js";
import type { ByteSource } from "../shell/io/source.js";
import {
	printInvalidOption,
	printRunError,
	printUsage,
	printVersion,
} from "../shell/output/report.js";

/**
 * Process-level handles a run reads from and writes to.
 */
export interface RunContext {
	readonly stdin: ByteSource;
	readonly stdout: ByteSink;
}

/**
 * Handles of the current process.
 *
 * @pure false (reads process globals)
 */
export function processContext(): RunContext {
	return { stdin: process.stdin, stdout: process.stdout };
}

/**
 * Feed every operand, in order, through one session.
 *
 * @effect Effect<void, SourceNotFound | CatIoError>
 */
export function concatenate(
	files: readonly string[],
	options: CatOptions,
	context: RunContext,
): Effect.Effect<void, SourceNotFound | CatIoError> {
	const operands = files.length === 0 ? [STDIN_OPERAND] : files;
	return Effect.gen(function* () {
		const session = yield* makeCatSession(options, context.stdout);
		for (const operand of operands) {
			yield* Effect.scoped(
				openSource(operand, options, context.stdin).pipe(
					Effect.flatMap(session.feed),
				),
			);
		}
		yield* session.finish;
	});
}

/**
 * Execute a parsed command.
 *
 * @effect Effect<ExitCode>
 * @invariant ExitCode ∈ {0,1}
 */
export function runCatEffect(
	command: CatCommand,
	context: RunContext,
): Effect.Effect<ExitCode> {
	return match(command)
		.with({ _tag: "Help" }, () =>
			Effect.sync((): ExitCode => {
				printUsage();
				return 0;
			}),
		)
		.with({ _tag: "Version" }, () =>
			Effect.sync((): ExitCode => {
				printVersion();
				return 0;
			}),
		)
		.with({ _tag: "InvalidOption" }, ({ option }) =>
			Effect.sync((): ExitCode => {
				printInvalidOption(option);
				return 1;
			}),
		)
		.with({ _tag: "Run" }, ({ files, options }) =>
			concatenate(files, options, context).pipe(
				Effect.map((): ExitCode => 0),
				Effect.catchAll((error) =>
					Effect.sync((): ExitCode => {
						printRunError(error);
						return 1;
					}),
				),
			),
		)
		.exhaustive();
}

/**
 * Entry for programmatic usage (does not terminate the process).
 *
 * @example
 * ```ts
 * const code = await runCat(parseCLIArgs(["-n", "notes.txt"]));
 * ```
 */
export function runCat(
	command: CatCommand,
	context: RunContext = processContext(),
): Promise<ExitCode> {
	return Effect.runPromise(runCatEffect(command, context));
}
