/**
 * State management for a synchronized playlist directory.
 * The document lives inside the directory so a snapshot of the directory captures it too.
 */

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import { CorruptStateError, FilesystemFailureError, errnoCode } from "../errors.js";
import { LANDED_FILENAME, STATE_FILENAME, isReservedName } from "./naming.js";
import { MEDIA_FORMATS, type CollectionState, type ItemRecord } from "./types.js";

export const STATE_VERSION = 1;

const itemRecordSchema = z.object({
	itemId: z.string().min(1),
	displayTitle: z.string(),
	localFilename: z.string().min(1),
	format: z.enum(MEDIA_FORMATS),
});

const excludedItemSchema = z.object({
	itemId: z.string().min(1),
	displayTitle: z.string(),
	reason: z.enum(["age-restricted", "unavailable"]),
	excludedAt: z.string(),
});

const collectionStateSchema = z
	.object({
		version: z.number().int().positive(),
		collectionId: z.string().min(1),
		title: z.string(),
		items: z.array(itemRecordSchema),
		excluded: z.array(excludedItemSchema).default([]),
		updatedAt: z.string().optional(),
	})
	.superRefine((state, ctx) => {
		const ids = new Set<string>();
		const names = new Set<string>();
		state.items.forEach((item, index) => {
			if (ids.has(item.itemId)) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["items", index, "itemId"], message: "duplicate item id" });
			}
			if (names.has(item.localFilename)) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["items", index, "localFilename"],
					message: "duplicate file name",
				});
			}
			ids.add(item.itemId);
			names.add(item.localFilename);
		});
	});

export function statePath(directory: string): string {
	return path.join(directory, STATE_FILENAME);
}

export function createState(collectionId: string, title: string): CollectionState {
	return {
		version: STATE_VERSION,
		collectionId,
		title,
		items: [],
		excluded: [],
	};
}

export function stateExists(directory: string): boolean {
	return fs.existsSync(statePath(directory));
}

/**
 * Load and validate the state document of a directory
 */
export async function loadState(directory: string): Promise<CollectionState> {
	const file = statePath(directory);

	let content: string;
	try {
		content = await fsp.readFile(file, "utf-8");
	} catch (error) {
		throw new CorruptStateError(directory, `cannot read ${STATE_FILENAME}`, [], { cause: error });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new CorruptStateError(directory, `${STATE_FILENAME} is not valid JSON`, [], { cause: error });
	}

	const parsed = collectionStateSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const where = issue ? `${issue.path.join(".")}: ${issue.message}` : "invalid document";
		throw new CorruptStateError(directory, `${STATE_FILENAME} is malformed (${where})`, [], {
			cause: parsed.error,
		});
	}

	if (parsed.data.version > STATE_VERSION) {
		throw new CorruptStateError(directory, `state version ${parsed.data.version} is newer than supported`);
	}

	return parsed.data;
}

/**
 * Temp file in the same directory, then rename over
 */
async function writeJsonAtomic(file: string, document: unknown, operation: string): Promise<void> {
	const tmpPath = `${file}.${randomUUID()}.tmp`;
	try {
		await fsp.writeFile(tmpPath, JSON.stringify(document, null, 2) + "\n", "utf-8");
		await fsp.rename(tmpPath, file);
	} catch (error) {
		await fsp.rm(tmpPath, { force: true });
		throw new FilesystemFailureError(operation, file, { cause: error });
	}
}

/**
 * Write the state document atomically
 */
export async function saveState(directory: string, state: CollectionState): Promise<void> {
	const document: CollectionState = { ...state, version: STATE_VERSION };
	await writeJsonAtomic(statePath(directory), document, "write state");
}

/**
 * File names claimed by the state that are missing on disk
 */
export function findMissingFiles(directory: string, state: CollectionState): string[] {
	return state.items
		.map((item) => item.localFilename)
		.filter((filename) => !fs.existsSync(path.join(directory, filename)));
}

/**
 * Throw if any claimed file is missing; no automatic repair is attempted
 */
export function verifyState(directory: string, state: CollectionState): void {
	const missing = findMissingFiles(directory, state);
	if (missing.length > 0) {
		const preview = missing.slice(0, 5).join(", ");
		const more = missing.length > 5 ? ` and ${missing.length - 5} more` : "";
		throw new CorruptStateError(directory, `missing files: ${preview}${more}`, missing);
	}
}

export function excludedIds(state: CollectionState): Set<string> {
	return new Set(state.excluded.map((entry) => entry.itemId));
}

// ═══════════════════════════════════════════════════════════════════════════════
// LANDED FILES
// ═══════════════════════════════════════════════════════════════════════════════

/*
 * New files are recorded here before they are moved into the directory. An update that
 * aborts (or dies) before its state commit leaves the journal behind, and the next run
 * adopts or deletes the files it lists.
 */

const landedSchema = z.array(itemRecordSchema);

export function landedPath(directory: string): string {
	return path.join(directory, LANDED_FILENAME);
}

export async function saveLanded(directory: string, records: ItemRecord[]): Promise<void> {
	await writeJsonAtomic(landedPath(directory), records, "write landed files");
}

export async function clearLanded(directory: string): Promise<void> {
	await fsp.rm(landedPath(directory), { force: true });
}

/**
 * Files left by an unfinished update that the state does not claim and that are still on disk
 */
export async function loadLanded(directory: string, state: CollectionState): Promise<ItemRecord[]> {
	let content: string;
	try {
		content = await fsp.readFile(landedPath(directory), "utf-8");
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			return [];
		}
		throw new CorruptStateError(directory, `cannot read ${LANDED_FILENAME}`, [], { cause: error });
	}

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (error) {
		throw new CorruptStateError(directory, `${LANDED_FILENAME} is not valid JSON`, [], { cause: error });
	}

	const parsed = landedSchema.safeParse(raw);
	if (!parsed.success) {
		throw new CorruptStateError(directory, `${LANDED_FILENAME} is malformed`, [], { cause: parsed.error });
	}

	const knownIds = new Set(state.items.map((item) => item.itemId));
	const claimed = new Set(state.items.map((item) => item.localFilename));
	const leftovers = new Map<string, ItemRecord>();
	for (const record of parsed.data) {
		const name = record.localFilename;
		if (
			knownIds.has(record.itemId) ||
			claimed.has(name) ||
			isReservedName(name) ||
			path.basename(name) !== name ||
			!fs.existsSync(path.join(directory, name))
		) {
			continue;
		}
		leftovers.set(record.itemId, record);
	}
	return [...leftovers.values()];
}
