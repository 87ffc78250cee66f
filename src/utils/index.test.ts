import { describe, test, expect } from "vitest";
import path from "path";
import { displayPath, normalizePath, processInBatches } from "./index.js";

describe("processInBatches", () => {
	test("keeps results in input order", async () => {
		const results = await processInBatches([30, 10, 20], 3, async (delay, index) => {
			await new Promise((resolve) => setTimeout(resolve, delay));
			return `${index}:${delay}`;
		});
		expect(results).toEqual(["0:30", "1:10", "2:20"]);
	});

	test("never exceeds the concurrency limit", async () => {
		let running = 0;
		let peak = 0;

		await processInBatches([1, 2, 3, 4, 5, 6], 2, async () => {
			running++;
			peak = Math.max(peak, running);
			await new Promise((resolve) => setTimeout(resolve, 5));
			running--;
		});

		expect(peak).toBe(2);
	});

	test("handles an empty list", async () => {
		expect(await processInBatches([], 4, async () => 1)).toEqual([]);
	});
});

describe("paths", () => {
	test("normalizePath uses forward slashes", () => {
		expect(normalizePath("a\\b\\c")).toBe("a/b/c");
	});

	test("displayPath shortens paths below the working directory", () => {
		expect(displayPath(path.join(process.cwd(), "music", "Road Trip"))).toBe("music/Road Trip");
	});
});
