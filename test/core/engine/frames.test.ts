import { describe, expect, it } from "vitest";

import { sliceIntoChunks } from "../../../src/core/engine/chunks.js";
import { FrameBuilder } from "../../../src/core/engine/frames.js";
import { bytes, latin1 } from "../../utils/bytes.js";

describe("FrameBuilder", () => {
	it("splits output at endFrame and keeps the open tail", () => {
		const out = new FrameBuilder(4);
		out.pushAscii("one\n");
		out.endFrame();
		out.pushBytes(bytes("two\n"));
		out.endFrame();
		out.pushByte(0x33);
		expect(out.frames().map((frame) => latin1(frame))).toEqual([
			"one\n",
			"two\n",
			"3",
		]);
	});

	it("ignores endFrame on an empty frame", () => {
		const out = new FrameBuilder(4);
		out.endFrame();
		out.pushAscii("x\n");
		out.endFrame();
		out.endFrame();
		expect(out.frames()).toHaveLength(1);
	});

	it("grows past its initial capacity", () => {
		const out = new FrameBuilder(1);
		const text = "0123456789".repeat(10);
		out.pushRange(bytes(`[${text}]`), 1, text.length + 1);
		expect(latin1(out.frames())).toBe(text);
	});
});

describe("sliceIntoChunks", () => {
	it("cuts a read into pieces of at most the given size", () => {
		const pieces = sliceIntoChunks(bytes("abcdefghij"), 3);
		expect(pieces.map((piece) => latin1(piece))).toEqual(["abc", "def", "ghi", "j"]);
	});

	it("returns a short read as is", () => {
		const chunk = bytes("abc");
		expect(sliceIntoChunks(chunk, 3)[0]).toBe(chunk);
	});

	it("drops empty reads", () => {
		expect(sliceIntoChunks(new Uint8Array(), 8)).toEqual([]);
	});

	it("rejects a non-positive size", () => {
		expect(() => sliceIntoChunks(bytes("a"), 0)).toThrow(RangeError);
	});
});
