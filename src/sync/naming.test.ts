import { describe, test, expect } from "vitest";
import {
	buildFilename,
	isReservedName,
	layoutFilenames,
	orderingToken,
	sanitizeFilename,
	tokenWidth,
	widthChanged,
	type LayoutEntry,
} from "./naming.js";

describe("Ordering tokens", () => {
	test("width follows the digit count of the collection size", () => {
		expect(tokenWidth(0)).toBe(1);
		expect(tokenWidth(9)).toBe(1);
		expect(tokenWidth(10)).toBe(2);
		expect(tokenWidth(100)).toBe(3);
	});

	test("tokens are 1-based and zero-padded", () => {
		expect(orderingToken(0, 5)).toBe("1");
		expect(orderingToken(0, 12)).toBe("01");
		expect(orderingToken(11, 12)).toBe("12");
		expect(orderingToken(6, 100)).toBe("007");
	});

	test("positions outside the collection are rejected", () => {
		expect(() => orderingToken(5, 5)).toThrow(RangeError);
		expect(() => orderingToken(-1, 5)).toThrow(RangeError);
	});

	test("widthChanged detects digit boundaries", () => {
		expect(widthChanged(9, 10)).toBe(true);
		expect(widthChanged(10, 9)).toBe(true);
		expect(widthChanged(10, 99)).toBe(false);
	});
});

describe("File names", () => {
	test("sanitizeFilename replaces invalid characters", () => {
		expect(sanitizeFilename('AC/DC: "Live" <1991>?')).toBe("AC_DC_ _Live_ _1991__");
	});

	test("sanitizeFilename normalizes whitespace and trailing dots", () => {
		expect(sanitizeFilename("  Song   With  Spaces...  ")).toBe("Song With Spaces");
	});

	test("sanitizeFilename replaces control characters", () => {
		expect(sanitizeFilename("Tab\there")).toBe("Tab_here");
	});

	test("sanitizeFilename never returns an empty name", () => {
		expect(sanitizeFilename("...")).toBe("untitled");
		expect(sanitizeFilename("   ")).toBe("untitled");
	});

	test("sanitizeFilename limits the length", () => {
		expect(sanitizeFilename("a".repeat(300))).toHaveLength(180);
	});

	test("buildFilename combines token, title and format", () => {
		expect(buildFilename(2, 10, "Song / Title", "mp3")).toBe("03 - Song _ Title.mp3");
	});

	test("reserved names are recognized", () => {
		expect(isReservedName(".plsync-state.json")).toBe(true);
		expect(isReservedName(".plsync.lock")).toBe(true);
		expect(isReservedName(".plsync-rename-ab12-0")).toBe(true);
		expect(isReservedName("1 - Song.mp3")).toBe(false);
	});
});

describe("layoutFilenames", () => {
	const entry = (title: string, currentFilename: string, previousPosition: number | null): LayoutEntry => ({
		title,
		format: "mp3",
		currentFilename,
		previousPosition,
	});

	test("items that keep their position keep their name", () => {
		const names = layoutFilenames([entry("A", "1 - A.mp3", 0), entry("B", "2 - B.mp3", 1)], 2);
		expect(names).toEqual(["1 - A.mp3", "2 - B.mp3"]);
	});

	test("moved and new items get names for their new position", () => {
		const names = layoutFilenames([entry("B", "2 - B.mp3", 1), entry("A", "1 - A.mp3", 0), entry("C", "staged.mp3", null)], 2);
		expect(names).toEqual(["1 - B.mp3", "2 - A.mp3", "3 - C.mp3"]);
	});

	test("a width change renames every item", () => {
		const entries = Array.from({ length: 10 }, (_, i) =>
			entry(`S${i}`, i < 9 ? `${i + 1} - S${i}.mp3` : "new.mp3", i < 9 ? i : null)
		);
		const names = layoutFilenames(entries, 9);
		expect(names[0]).toBe("01 - S0.mp3");
		expect(names[8]).toBe("09 - S8.mp3");
		expect(names[9]).toBe("10 - S9.mp3");
	});
});
