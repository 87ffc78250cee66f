import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import { AgeRestrictedError, FilesystemFailureError, RetrievalFailedError } from "../errors.js";
import { BackupManager, listBackups, type BackupHandle } from "./backup.js";
import { computePlan } from "./diff.js";
import { executePlan, nodeFileOperations, renameInTwoPasses, type ExecutionPhase, type FileOperations } from "./executor.js";
import { buildFilename } from "./naming.js";
import { createState, landedPath, loadLanded, loadState, saveState, statePath } from "./state.js";
import { FakeRetriever, listMedia, makeTempRoot } from "./testing.js";
import type { CollectionState, RemoteCollection } from "./types.js";

const QUALITY = { maxHeight: 720, audioQuality: 5 };
const NOW = () => new Date("2026-05-01T12:00:00.000Z");

async function seed(dir: string, ids: string[], title = (id: string) => `Song ${id}`): Promise<CollectionState> {
	const state: CollectionState = {
		...createState("PL1234567890", "Road Trip"),
		items: ids.map((id, i) => ({
			itemId: id,
			displayTitle: title(id),
			localFilename: buildFilename(i, ids.length, title(id), "mp3"),
			format: "mp3",
		})),
		updatedAt: "2026-01-01T00:00:00.000Z",
	};
	for (const item of state.items) {
		fs.writeFileSync(path.join(dir, item.localFilename), `media:${item.itemId}`);
	}
	await saveState(dir, state);
	return state;
}

function listing(ids: string[], title = (id: string) => `Song ${id}`): RemoteCollection {
	return { id: "PL1234567890", title: "Road Trip", items: ids.map((id) => ({ itemId: id, displayTitle: title(id) })) };
}

describe("executePlan", () => {
	let root: string;
	let dir: string;
	let retriever: FakeRetriever;

	beforeEach(() => {
		root = makeTempRoot("executor");
		dir = path.join(root, "Road Trip");
		fs.mkdirSync(dir);
		retriever = new FakeRetriever();
	});

	afterEach(() => {
		fs.rmSync(root, { recursive: true, force: true });
	});

	const run = (previous: CollectionState, collection: RemoteCollection, extra: Partial<Parameters<typeof executePlan>[0]> = {}) =>
		executePlan({
			directory: dir,
			previous,
			collection,
			plan: computePlan(previous.items, collection.items),
			retriever,
			backups: new BackupManager(),
			format: "mp3",
			quality: QUALITY,
			now: NOW,
			...extra,
		});

	test("first download with a failing item commits the rest without a backup", async () => {
		retriever.failures.set("Y", new RetrievalFailedError("Y", "network down"));
		const phases: ExecutionPhase[] = [];

		const result = await run(createState("PL1234567890", ""), listing(["X", "Y"]), {
			onEvent: (event) => {
				if (event.type === "phase") phases.push(event.phase);
			},
		});

		expect(result.status).toBe("committed");
		expect(result.backupCreated).toBe(false);
		expect(phases).not.toContain("backup");
		expect(result.added).toEqual([{ itemId: "X", displayTitle: "Song X", position: 0, localFilename: "1 - Song X.mp3" }]);
		expect(result.failed).toEqual([
			{ itemId: "Y", displayTitle: "Song Y", reason: "retrieval", error: "Retrieval of Y failed: network down" },
		]);
		expect(listMedia(dir)).toEqual(["1 - Song X.mp3"]);

		const saved = await loadState(dir);
		expect(saved.items.map((item) => item.itemId)).toEqual(["X"]);
		expect(saved.title).toBe("Road Trip");
		expect(saved.updatedAt).toBe("2026-05-01T12:00:00.000Z");
	});

	test("[A,B,C] -> [C,A,D] removes, reorders and adds", async () => {
		const previous = await seed(dir, ["A", "B", "C"]);
		const phases: ExecutionPhase[] = [];

		const result = await run(previous, listing(["C", "A", "D"]), {
			onEvent: (event) => {
				if (event.type === "phase") phases.push(event.phase);
			},
		});

		expect(result.status).toBe("committed");
		expect(phases).toEqual(["additions", "backup", "removals", "moves", "commit", "discard"]);
		expect(listMedia(dir)).toEqual(["1 - Song C.mp3", "2 - Song A.mp3", "3 - Song D.mp3"]);
		expect(fs.readFileSync(path.join(dir, "1 - Song C.mp3"), "utf-8")).toBe("media:C");
		expect(fs.readFileSync(path.join(dir, "2 - Song A.mp3"), "utf-8")).toBe("media:A");
		expect(fs.readFileSync(path.join(dir, "3 - Song D.mp3"), "utf-8")).toBe("media:D");

		expect(result.removed).toEqual([{ itemId: "B", displayTitle: "Song B", localFilename: "2 - Song B.mp3" }]);
		expect(result.moved.map((m) => `${m.itemId}:${m.from}->${m.to}`)).toEqual(["C:2->0", "A:0->1"]);
		expect(result.added.map((a) => a.localFilename)).toEqual(["3 - Song D.mp3"]);
		expect(result.backupCreated).toBe(true);
		expect(await listBackups(dir)).toEqual([]);

		const saved = await loadState(dir);
		expect(saved.items.map((item) => [item.itemId, item.localFilename])).toEqual([
			["C", "1 - Song C.mp3"],
			["A", "2 - Song A.mp3"],
			["D", "3 - Song D.mp3"],
		]);
	});

	test("swapping items with identical titles never overwrites a file", async () => {
		const previous = await seed(dir, ["A", "B"], () => "Same");

		const result = await run(previous, listing(["B", "A"], () => "Same"));

		expect(result.status).toBe("committed");
		expect(listMedia(dir)).toEqual(["1 - Same.mp3", "2 - Same.mp3"]);
		expect(fs.readFileSync(path.join(dir, "1 - Same.mp3"), "utf-8")).toBe("media:B");
		expect(fs.readFileSync(path.join(dir, "2 - Same.mp3"), "utf-8")).toBe("media:A");
	});

	test("a failed rename restores the directory and keeps the state", async () => {
		const previous = await seed(dir, ["A", "B", "C"]);
		const stateBefore = fs.readFileSync(statePath(dir), "utf-8");
		const failing: FileOperations = {
			...nodeFileOperations,
			rename: async (from, to) => {
				if (path.basename(to) === "2 - Song A.mp3") {
					throw new Error("injected");
				}
				await nodeFileOperations.rename(from, to);
			},
		};

		const result = await run(previous, listing(["C", "A", "D"]), { fileOps: failing });

		expect(result.status).toBe("aborted");
		expect(result.error).toBe(`rename failed for ${path.join(dir, "2 - Song A.mp3")}: injected`);
		expect(result.added).toEqual([]);
		expect(result.removed).toEqual([]);
		expect(result.moved).toEqual([]);
		expect(result.landed).toEqual([{ itemId: "D", displayTitle: "Song D", position: 2, localFilename: "3 - Song D.mp3" }]);
		expect(result.backupCreated).toBe(true);

		// The landed addition predates the snapshot and survives the restore
		expect(listMedia(dir)).toEqual(["1 - Song A.mp3", "2 - Song B.mp3", "3 - Song C.mp3", "3 - Song D.mp3"]);
		expect(fs.readFileSync(statePath(dir), "utf-8")).toBe(stateBefore);
		expect(await listBackups(dir)).toEqual([]);
	});

	test("a failed state write restores the directory", async () => {
		const previous = await seed(dir, ["A", "B"]);
		const failing: FileOperations = {
			...nodeFileOperations,
			writeState: async () => {
				throw new FilesystemFailureError("write state", statePath(dir), { cause: new Error("disk full") });
			},
		};

		const result = await run(previous, listing(["B"]), { fileOps: failing });

		expect(result.status).toBe("aborted");
		expect(listMedia(dir)).toEqual(["1 - Song A.mp3", "2 - Song B.mp3"]);
		expect((await loadState(dir)).items.map((item) => item.itemId)).toEqual(["A", "B"]);
	});

	test("a failed snapshot aborts before anything is removed", async () => {
		class BrokenBackups extends BackupManager {
			async snapshot(directory: string): Promise<BackupHandle> {
				throw new FilesystemFailureError("snapshot", directory, { cause: new Error("no space") });
			}
		}
		const previous = await seed(dir, ["A", "B"]);

		const result = await run(previous, listing(["B"]), { backups: new BrokenBackups() });

		expect(result.status).toBe("aborted");
		expect(result.backupCreated).toBe(false);
		expect(result.error).toBe(`snapshot failed for ${dir}: no space`);
		expect(listMedia(dir)).toEqual(["1 - Song A.mp3", "2 - Song B.mp3"]);
	});

	test("age-restricted items are excluded from future runs", async () => {
		retriever.failures.set("Y", new AgeRestrictedError("Y"));

		const result = await run(createState("PL1234567890", ""), listing(["X", "Y"]));

		expect(result.failed).toEqual([
			{ itemId: "Y", displayTitle: "Song Y", reason: "age-restricted", error: "Item Y is age restricted" },
		]);
		expect((await loadState(dir)).excluded).toEqual([
			{ itemId: "Y", displayTitle: "Song Y", reason: "age-restricted", excludedAt: "2026-05-01T12:00:00.000Z" },
		]);
	});

	test("cancellation skips additions but still applies removals and moves", async () => {
		const previous = await seed(dir, ["A", "B"]);
		const controller = new AbortController();
		controller.abort();

		const result = await run(previous, listing(["B", "C"]), { signal: controller.signal });

		expect(result.status).toBe("committed");
		expect(retriever.requests).toEqual([]);
		expect(result.failed).toEqual([{ itemId: "C", displayTitle: "Song C", reason: "cancelled", error: "cancelled" }]);
		expect(listMedia(dir)).toEqual(["1 - Song B.mp3"]);
	});

	test("an item that exceeds its timeout fails without blocking the others", async () => {
		retriever.hang.add("slow");

		const result = await run(createState("PL1234567890", ""), listing(["slow", "fast"]), {
			itemTimeoutMs: 50,
			concurrency: 2,
		});

		expect(result.failed).toEqual([{ itemId: "slow", displayTitle: "Song slow", reason: "retrieval", error: "timed out" }]);
		expect(listMedia(dir)).toEqual(["1 - Song fast.mp3"]);
	});

	test("growing past nine items renumbers every file", async () => {
		const ids = ["a", "b", "c", "d", "e", "f", "g", "h", "i"];
		const previous = await seed(dir, ids);

		const result = await run(previous, listing([...ids, "j"]));

		expect(result.status).toBe("committed");
		expect(result.backupCreated).toBe(true);
		expect(listMedia(dir)[0]).toBe("01 - Song a.mp3");
		expect(listMedia(dir)[9]).toBe("10 - Song j.mp3");
		expect(result.moved).toEqual([]);
	});

	describe("leftovers of an aborted update", () => {
		// [A,B,C] -> [C,A,D] whose rename of A fails: D lands, the rest is restored
		const abortAfterLanding = async (): Promise<CollectionState> => {
			const previous = await seed(dir, ["A", "B", "C"]);
			const failing: FileOperations = {
				...nodeFileOperations,
				rename: async (from, to) => {
					if (path.basename(to) === "2 - Song A.mp3") {
						throw new Error("injected");
					}
					await nodeFileOperations.rename(from, to);
				},
			};
			const result = await run(previous, listing(["C", "A", "D"]), { fileOps: failing });
			expect(result.status).toBe("aborted");
			retriever.requests = [];
			return previous;
		};

		test("the journal lists the landed file", async () => {
			const previous = await abortAfterLanding();

			expect(await loadLanded(dir, previous)).toEqual([
				{ itemId: "D", displayTitle: "Song D", localFilename: "3 - Song D.mp3", format: "mp3" },
			]);
		});

		test("a leftover still wanted is renamed instead of downloaded again", async () => {
			const previous = await abortAfterLanding();
			const leftovers = await loadLanded(dir, previous);

			const result = await run(previous, listing(["D", "C", "A"]), { leftovers });

			expect(result.status).toBe("committed");
			expect(retriever.requests).toEqual([]);
			expect(result.discarded).toEqual([]);
			expect(listMedia(dir)).toEqual(["1 - Song D.mp3", "2 - Song C.mp3", "3 - Song A.mp3"]);
			expect(fs.readFileSync(path.join(dir, "1 - Song D.mp3"), "utf-8")).toBe("media:D");
			expect(fs.existsSync(landedPath(dir))).toBe(false);
		});

		test("a leftover no longer wanted is deleted", async () => {
			const previous = await abortAfterLanding();
			const leftovers = await loadLanded(dir, previous);

			const result = await run(previous, listing(["B", "A"]), { leftovers });

			expect(result.status).toBe("committed");
			expect(result.discarded).toEqual(["3 - Song D.mp3"]);
			expect(listMedia(dir)).toEqual(["1 - Song B.mp3", "2 - Song A.mp3"]);
			expect((await loadState(dir)).items.map((item) => item.localFilename)).toEqual(["1 - Song B.mp3", "2 - Song A.mp3"]);
			expect(fs.existsSync(landedPath(dir))).toBe(false);
		});
	});

	test("rename temporaries use the reserved prefix", async () => {
		const previous = await seed(dir, ["A", "B"]);
		const seen: string[] = [];
		const recording: FileOperations = {
			...nodeFileOperations,
			rename: async (from, to) => {
				seen.push(path.basename(to));
				await nodeFileOperations.rename(from, to);
			},
		};

		await run(previous, listing(["B", "A"]), { fileOps: recording });

		expect(seen.filter((name) => name.startsWith(".plsync-rename-"))).toHaveLength(2);
	});

	test("staging is cleaned up", async () => {
		await run(createState("PL1234567890", ""), listing(["X"]));
		expect(fs.existsSync(path.join(dir, ".plsync-staging"))).toBe(false);
	});
});

describe("renameInTwoPasses", () => {
	let dir: string;

	beforeEach(() => {
		dir = makeTempRoot("rename");
	});

	afterEach(() => {
		fs.rmSync(dir, { recursive: true, force: true });
	});

	test("rotates a cycle of names", async () => {
		for (const name of ["a", "b", "c"]) {
			fs.writeFileSync(path.join(dir, name), name);
		}

		await renameInTwoPasses(dir, [
			{ currentFilename: "a", target: "b" },
			{ currentFilename: "b", target: "c" },
			{ currentFilename: "c", target: "a" },
		]);

		expect(fs.readFileSync(path.join(dir, "b"), "utf-8")).toBe("a");
		expect(fs.readFileSync(path.join(dir, "c"), "utf-8")).toBe("b");
		expect(fs.readFileSync(path.join(dir, "a"), "utf-8")).toBe("c");
		expect(fs.readdirSync(dir).sort()).toEqual(["a", "b", "c"]);
	});
});
