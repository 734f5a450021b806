// CHANGE: Tests for the application layer over temporary files and in-memory handles
// WHY: Every command must map to an exit code; a failing operand stops the run after earlier output

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";

import { type RunContext, runCat } from "../../src/app/runCat.js";
import { CatCommand } from "../../src/core/command.js";
import { defaultOptions, withNumbering } from "../../src/core/options.js";
import { parseCLIArgs } from "../../src/shell/config/index.js";
import { type CollectingSink, collectingSink, sourceOf } from "../utils/bytes.js";

let workDir = "";
const fileIn = (name: string): string => path.join(workDir, name);

beforeAll(() => {
	workDir = fs.mkdtempSync(path.join(os.tmpdir(), "linecat-run-"));
	fs.writeFileSync(fileIn("a.txt"), "a\n");
	fs.writeFileSync(fileIn("b.txt"), "b\n");
});

afterAll(() => {
	fs.rmSync(workDir, { recursive: true, force: true });
});

function contextWith(...stdin: readonly string[]): {
	readonly context: RunContext;
	readonly out: CollectingSink;
} {
	const out = collectingSink();
	return { context: { stdin: sourceOf(...stdin), stdout: out.sink }, out };
}

describe("runCat: terminal commands", () => {
	it("prints usage and exits 0", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const { context, out } = contextWith();
		await expect(runCat(CatCommand.Help(), context)).resolves.toBe(0);
		expect(log).toHaveBeenCalledTimes(1);
		expect(out.writes).toEqual([]);
	});

	it("prints the version and exits 0", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		const { context } = contextWith();
		await expect(runCat(CatCommand.Version(), context)).resolves.toBe(0);
		expect(log).toHaveBeenCalledTimes(1);
	});

	it("reports an invalid option on stderr and exits 1", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const { context } = contextWith();
		await expect(runCat(parseCLIArgs(["-z"]), context)).resolves.toBe(1);
		expect(error).toHaveBeenCalledTimes(1);
	});
});

describe("runCat: runs", () => {
	it("concatenates files with shared numbering", async () => {
		const { context, out } = contextWith();
		const code = await runCat(parseCLIArgs(["-n", fileIn("a.txt"), fileIn("b.txt")]), context);
		expect(code).toBe(0);
		expect(out.text()).toBe("     1\ta\n     2\tb\n");
	});

	it("reads standard input when no operand is given", async () => {
		const { context, out } = contextWith("x\n", "y\n");
		const code = await runCat(
			CatCommand.Run({ files: [], options: withNumbering(defaultOptions, "all") }),
			context,
		);
		expect(code).toBe(0);
		expect(out.text()).toBe("     1\tx\n     2\ty\n");
	});

	it("reads standard input in place of -", async () => {
		const { context, out } = contextWith("middle\n");
		const code = await runCat(parseCLIArgs([fileIn("a.txt"), "-", fileIn("b.txt")]), context);
		expect(code).toBe(0);
		expect(out.text()).toBe("a\nmiddle\nb\n");
	});

	it("stops at a missing file after earlier output", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const { context, out } = contextWith();
		const missing = fileIn("missing.txt");
		const code = await runCat(parseCLIArgs([fileIn("a.txt"), missing, fileIn("b.txt")]), context);
		expect(code).toBe(1);
		expect(out.text()).toBe("a\n");
		expect(error).toHaveBeenCalledTimes(1);
		const line = String(error.mock.calls[0]?.[0]);
		expect(line).toContain(missing);
		expect(line).toContain("No such file or directory");
	});
});
