import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import { computePlan } from "./diff.js";
import {
	clearFailureLog,
	describePlan,
	failureEntriesFor,
	loadFailureLog,
	summarizeReports,
	writeFailureLog,
} from "./logger.js";
import { makeTempRoot } from "./testing.js";
import type { UpdateReport } from "./types.js";

function report(overrides: Partial<UpdateReport> = {}): UpdateReport {
	return {
		status: "committed",
		collectionId: "PL1234567890",
		title: "Road Trip",
		directory: "/music/Road Trip",
		dryRun: false,
		added: [],
		removed: [],
		moved: [],
		failed: [],
		landed: [],
		discarded: [],
		backupCreated: false,
		durationMs: 1200,
		...overrides,
	};
}

describe("Failure Log", () => {
	let dir: string;
	let logPath: string;

	beforeEach(() => {
		dir = makeTempRoot("logger");
		logPath = path.join(dir, "nested", "sync-errors.json");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	test("entries are appended with a timestamp", () => {
		writeFailureLog(logPath, [{ playlist: "Road Trip", error: "HTTP Error 404", type: "listing" }]);
		writeFailureLog(logPath, [{ playlist: "Chill", error: "boom", type: "update_aborted" }]);

		const entries = loadFailureLog(logPath);
		expect(entries.map((entry) => entry.playlist)).toEqual(["Road Trip", "Chill"]);
		expect(typeof entries[0].timestamp).toBe("string");
	});

	test("only the most recent 1000 entries are kept", () => {
		const batch = Array.from({ length: 1005 }, (_, i) => ({ playlist: `P${i}`, error: "x", type: "listing" as const }));
		writeFailureLog(logPath, batch);

		const entries = loadFailureLog(logPath);
		expect(entries).toHaveLength(1000);
		expect(entries[0].playlist).toBe("P5");
	});

	test("an unreadable log starts over", () => {
		fs.mkdirSync(path.dirname(logPath), { recursive: true });
		fs.writeFileSync(logPath, "{ broken");
		expect(loadFailureLog(logPath)).toEqual([]);
	});

	test("clearFailureLog deletes the file", () => {
		writeFailureLog(logPath, [{ playlist: "Road Trip", error: "x", type: "listing" }]);
		clearFailureLog(logPath);
		expect(fs.existsSync(logPath)).toBe(false);
	});

	test("failureEntriesFor covers failed items and aborted updates", () => {
		const entries = failureEntriesFor(
			report({
				status: "aborted",
				error: "rename failed",
				failed: [{ itemId: "a1", displayTitle: "First", reason: "cancelled", error: "cancelled" }],
			})
		);

		expect(entries).toEqual([
			{
				playlist: "Road Trip",
				collectionId: "PL1234567890",
				itemId: "a1",
				itemTitle: "First",
				error: "[cancelled] cancelled",
				type: "item_download",
			},
			{ playlist: "Road Trip", collectionId: "PL1234567890", error: "rename failed", type: "update_aborted" },
		]);
	});
});

describe("Run Summary", () => {
	test("describePlan counts each kind of change", () => {
		const plan = computePlan(
			[
				{ itemId: "A", displayTitle: "A", localFilename: "1 - A.mp3", format: "mp3" },
				{ itemId: "B", displayTitle: "B", localFilename: "2 - B.mp3", format: "mp3" },
			],
			[
				{ itemId: "A", displayTitle: "A" },
				{ itemId: "C", displayTitle: "C" },
			]
		);
		expect(describePlan(plan)).toBe("1 to add, 1 to remove, 0 to move, 1 unchanged");
	});

	test("summarizeReports totals every report", () => {
		const summary = summarizeReports(
			[
				report({ added: [{ itemId: "a", displayTitle: "a", position: 0, localFilename: "1 - a.mp3" }] }),
				report({ status: "aborted", failed: [{ itemId: "b", displayTitle: "b", reason: "retrieval", error: "x" }] }),
			],
			5000
		);

		expect(summary).toEqual({
			playlists: 2,
			committed: 1,
			aborted: 1,
			added: 1,
			removed: 0,
			moved: 0,
			failed: 1,
			duration: 5000,
		});
	});
});
