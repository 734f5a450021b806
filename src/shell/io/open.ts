// CHANGE: Scoped opening of named sources with a distinct "not found" condition
// WHY: Missing files are reported apart from generic I/O failures, and only at open time
// PURITY: SHELL
// EFFECT: Effect<ByteSource, SourceNotFound | CatIoError, Scope>
// INVARIANT: A file handle opened here is closed exactly once, when the scope closes
// COMPLEXITY: O(1)

import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";

import { Effect, type Scope } from "effect";

import { CatIoError, errnoCode, SourceNotFound } from "../../core/errors.js";
import type { CatOptions } from "../../core/models.js";
import { STDIN_OPERAND } from "../../core/models.js";
import { chunkSizeFor } from "../../core/options.js";
import type { ByteSource } from "./source.js";

function openFailure(path: string, cause: unknown): SourceNotFound | CatIoError {
	if (cause instanceof Error && errnoCode(cause) === "ENOENT") {
		return new SourceNotFound({ path });
	}
	return CatIoError.fromCause(cause);
}

/**
 * Close a handle; a failed close is logged and never fails the run.
 *
 * @effect Effect<void>
 */
export function closeHandle(handle: Pick<FileHandle, "close">): Effect.Effect<void> {
	return Effect.tryPromise(() => handle.close()).pipe(Effect.ignoreLogged);
}

/**
 * Open a command-line operand for reading.
 *
 * `-` yields `stdin`, which is never closed here. Any other operand is a
 * path read with the chunk size the options select.
 *
 * @param path - operand as given on the command line
 * @param options - resolved options (selects the read size)
 * @param stdin - source standing for `-`
 *
 * @pure false (opens files)
 * @effect Effect<ByteSource, SourceNotFound | CatIoError, Scope>
 */
export function openSource(
	path: string,
	options: CatOptions,
	stdin: ByteSource,
): Effect.Effect<ByteSource, SourceNotFound | CatIoError, Scope.Scope> {
	if (path === STDIN_OPERAND) return Effect.succeed(stdin);
	return Effect.acquireRelease(
		Effect.tryPromise({
			try: () => open(path, "r"),
			catch: (cause) => openFailure(path, cause),
		}),
		closeHandle,
	).pipe(
		Effect.map(
			(handle): ByteSource =>
				handle.createReadStream({
					highWaterMark: chunkSizeFor(options),
					autoClose: false,
				}),
		),
	);
}
