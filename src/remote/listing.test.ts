import { describe, test, expect } from "vitest";
import { parseListing } from "./listing.js";
import { lastErrorLine } from "./ytdlp.js";

describe("parseListing", () => {
	test("keeps playable entries in order", () => {
		const parsed = parseListing("PL1234567890", {
			id: "PL1234567890",
			title: " Road Trip ",
			entries: [
				{ id: "a1", title: "First" },
				{ id: "b2", title: "Second", availability: "public" },
			],
		});

		expect(parsed.collection).toEqual({
			id: "PL1234567890",
			title: "Road Trip",
			items: [
				{ itemId: "a1", displayTitle: "First" },
				{ itemId: "b2", displayTitle: "Second" },
			],
		});
		expect(parsed.unavailable + parsed.malformed + parsed.duplicates).toBe(0);
	});

	test("drops deleted, private and restricted entries", () => {
		const parsed = parseListing("PL1234567890", {
			title: "Mix",
			entries: [
				null,
				{ id: "d1", title: "[Deleted video]" },
				{ id: "p1", title: "[Private video]" },
				{ id: "m1", title: "Members", availability: "subscriber_only" },
				{ id: "ok", title: "Fine" },
			],
		});

		expect(parsed.collection.items.map((item) => item.itemId)).toEqual(["ok"]);
		expect(parsed.unavailable).toBe(4);
	});

	test("drops malformed entries and repeated ids", () => {
		const parsed = parseListing("PL1234567890", {
			entries: [{ title: "no id" }, { id: "a1", title: "First" }, { id: "a1", title: "Again" }, 42],
		});

		expect(parsed.collection.items).toEqual([{ itemId: "a1", displayTitle: "First" }]);
		expect(parsed.malformed).toBe(2);
		expect(parsed.duplicates).toBe(1);
	});

	test("falls back for missing titles", () => {
		const parsed = parseListing("PL1234567890", { entries: [{ id: "a1", title: null }] });

		expect(parsed.collection.id).toBe("PL1234567890");
		expect(parsed.collection.title).toBe("Unknown Playlist");
		expect(parsed.collection.items).toEqual([{ itemId: "a1", displayTitle: "a1" }]);
	});

	test("throws on something that is not a playlist", () => {
		expect(() => parseListing("PL1234567890", "not json object")).toThrow();
	});
});

describe("lastErrorLine", () => {
	test("prefers the last ERROR line without its prefix", () => {
		const stderr = "WARNING: something\nERROR: [youtube] abc: Video unavailable\nDeleting file\n";
		expect(lastErrorLine(stderr)).toBe("[youtube] abc: Video unavailable");
	});

	test("falls back to the last line, then to a placeholder", () => {
		expect(lastErrorLine("first\nsecond\n")).toBe("second");
		expect(lastErrorLine("")).toBe("no output");
	});
});
