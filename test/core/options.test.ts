// CHANGE: Unit tests for the option record, its dual setters and derived queries
// INVARIANT: canWriteFast(o) holds only for the all-disabled record

import { pipe } from "effect";
import { describe, expect, it } from "vitest";

import type { CatOptions } from "../../src/core/models.js";
import {
	canWriteFast,
	chunkSizeFor,
	defaultOptions,
	endOfLine,
	renderModeOf,
	tabGlyph,
	withNumbering,
	withShowEnds,
	withShowNonprinting,
	withShowTabs,
	withSqueezeBlank,
} from "../../src/core/options.js";

describe("setters", () => {
	it("data-first and data-last forms build the same record", () => {
		const dataFirst = withShowEnds(withNumbering(defaultOptions, "all"), true);
		const dataLast = pipe(
			defaultOptions,
			withNumbering("all"),
			withShowEnds(true),
		);
		expect(dataFirst).toEqual(dataLast);
		expect(dataLast).toEqual({
			numbering: "all",
			showEnds: true,
			squeezeBlank: false,
			showTabs: false,
			showNonprinting: false,
		});
	});

	it("touches only its own field and leaves the input untouched", () => {
		const updated = withSqueezeBlank(defaultOptions, true);
		expect(updated).not.toBe(defaultOptions);
		expect(defaultOptions.squeezeBlank).toBe(false);
		expect(updated).toEqual({ ...defaultOptions, squeezeBlank: true });
	});
});

describe("canWriteFast", () => {
	it("is true for the defaults", () => {
		expect(canWriteFast(defaultOptions)).toBe(true);
	});

	const annotated: Array<[string, CatOptions]> = [
		["numbering all", withNumbering(defaultOptions, "all")],
		["numbering nonempty", withNumbering(defaultOptions, "nonempty")],
		["show ends", withShowEnds(defaultOptions, true)],
		["squeeze blank", withSqueezeBlank(defaultOptions, true)],
		["show tabs", withShowTabs(defaultOptions, true)],
		["show nonprinting", withShowNonprinting(defaultOptions, true)],
	];

	it.each(annotated)("is false with %s", (_name, options) => {
		expect(canWriteFast(options)).toBe(false);
	});

	it("becomes true again once the option is switched back off", () => {
		const options = pipe(defaultOptions, withShowTabs(true), withShowTabs(false));
		expect(canWriteFast(options)).toBe(true);
	});
});

describe("derived queries", () => {
	it("prefers non-printing escape over tab marking", () => {
		const both = pipe(defaultOptions, withShowTabs(true), withShowNonprinting(true));
		expect(renderModeOf(both)).toBe("nonprinting");
		expect(renderModeOf(withShowTabs(defaultOptions, true))).toBe("tabs");
		expect(renderModeOf(defaultOptions)).toBe("verbatim");
	});

	it("resolves the tab glyph from showTabs", () => {
		expect(tabGlyph(withShowTabs(defaultOptions, true))).toBe("^I");
		expect(tabGlyph(withShowNonprinting(defaultOptions, true))).toBe("\t");
	});

	it("marks line ends with $ only when asked", () => {
		expect(endOfLine(withShowEnds(defaultOptions, true))).toBe("$\n");
		expect(endOfLine(defaultOptions)).toBe("\n");
	});

	it("reads 64 KiB on the fast path and 31 KiB otherwise", () => {
		expect(chunkSizeFor(defaultOptions)).toBe(65536);
		expect(chunkSizeFor(withShowEnds(defaultOptions, true))).toBe(31744);
	});
});
