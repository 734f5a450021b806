import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import { writeFrames } from "../../../src/shell/io/sink.js";
import { bytes, collectingSink, failingSink, latin1 } from "../../utils/bytes.js";

describe("writeFrames", () => {
	it("does nothing for no frames", async () => {
		const out = collectingSink();
		await Effect.runPromise(writeFrames(out.sink, []));
		expect(out.writes).toEqual([]);
	});

	it("writes frames in order, one write each", async () => {
		const out = collectingSink();
		await Effect.runPromise(writeFrames(out.sink, [bytes("a\n"), bytes("b\n"), bytes("c")]));
		expect(out.writes.map((w) => latin1(w))).toEqual(["a\n", "b\n", "c"]);
	});

	it("leaves no error listener behind after success", async () => {
		const out = collectingSink();
		const before = out.sink.listenerCount("error");
		await Effect.runPromise(writeFrames(out.sink, [bytes("a")]));
		expect(out.sink.listenerCount("error")).toBe(before);
	});

	it("maps a failed write to CatIoError", async () => {
		const error = await Effect.runPromise(
			Effect.flip(writeFrames(failingSink("no space"), [bytes("a")])),
		);
		expect(error).toMatchObject({ _tag: "CatIo", detail: "no space" });
	});

	it("fails when an earlier frame of the batch is rejected", async () => {
		const error = await Effect.runPromise(
			Effect.flip(writeFrames(failingSink("no space"), [bytes("a"), bytes("b")])),
		);
		expect(error._tag).toBe("CatIo");
	});
});
