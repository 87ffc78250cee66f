import fs from "fs";
import fsp from "fs/promises";
import os from "os";
import path from "path";
import type { MaterializeRequest, RemoteEnumerator, Retriever } from "../remote/types.js";
import type { RemoteCollection, RemoteItem } from "./types.js";

/**
 * Enumerator serving an in-memory listing that tests can change between runs
 */
export class FakeEnumerator implements RemoteEnumerator {
	calls = 0;
	failure: Error | null = null;

	constructor(
		public id: string,
		public title: string,
		public items: RemoteItem[] = []
	) {}

	setItems(ids: string[]) {
		this.items = ids.map((id) => ({ itemId: id, displayTitle: `Song ${id}` }));
	}

	async listCollection(): Promise<RemoteCollection> {
		this.calls++;
		if (this.failure) {
			throw this.failure;
		}
		return { id: this.id, title: this.title, items: this.items.map((item) => ({ ...item })) };
	}
}

/**
 * Retriever writing "media:<id>" into the staging area instead of downloading
 */
export class FakeRetriever implements Retriever {
	requests: MaterializeRequest[] = [];
	failures = new Map<string, Error>();
	/** Resolves only when the request signal aborts */
	hang = new Set<string>();

	async materialize(request: MaterializeRequest): Promise<string> {
		this.requests.push(request);

		if (this.hang.has(request.itemId)) {
			await new Promise<void>((_resolve, reject) => {
				request.signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
			});
		}

		const failure = this.failures.get(request.itemId);
		if (failure) {
			throw failure;
		}

		const file = path.join(request.stagingDir, `${request.itemId}.${request.format}`);
		await fsp.writeFile(file, `media:${request.itemId}`);
		return file;
	}
}

export function makeTempRoot(label: string): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), `plsync-${label}-`));
}

/**
 * Non-hidden entries of a directory, sorted
 */
export function listMedia(directory: string): string[] {
	return fs
		.readdirSync(directory)
		.filter((name) => !name.startsWith("."))
		.sort();
}

/**
 * Every file below `directory` with its content, for byte-for-byte comparisons
 */
export function readTree(directory: string): Record<string, string> {
	const tree: Record<string, string> = {};
	for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
		const full = path.join(directory, entry.name);
		if (entry.isDirectory()) {
			for (const [name, content] of Object.entries(readTree(full))) {
				tree[`${entry.name}/${name}`] = content;
			}
		} else {
			tree[entry.name] = fs.readFileSync(full, "utf-8");
		}
	}
	return tree;
}
