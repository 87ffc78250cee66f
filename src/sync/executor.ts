import fsp from "fs/promises";
import path from "path";
import { randomBytes } from "crypto";
import {
	AgeRestrictedError,
	FilesystemFailureError,
	errorMessage,
	isPermanentItemFailure,
} from "../errors.js";
import type { QualityCeiling, Retriever } from "../remote/types.js";
import { processInBatches } from "../utils/index.js";
import type { BackupHandle, BackupManager } from "./backup.js";
import {
	buildFilename,
	layoutFilenames,
	sanitizeFilename,
	RENAME_PREFIX,
	STAGING_DIRNAME,
	type LayoutEntry,
} from "./naming.js";
import { clearLanded, saveLanded, saveState } from "./state.js";
import { silentLogger, type SyncLogger } from "./logger.js";
import type {
	AddedItem,
	CollectionState,
	ExcludedItem,
	FailedItem,
	ItemRecord,
	MediaFormat,
	MovedItem,
	Plan,
	PlannedAddition,
	RemoteCollection,
	RemovedItem,
} from "./types.js";

/**
 * Filesystem primitives used by the destructive phases
 */
export interface FileOperations {
	rename(from: string, to: string): Promise<void>;
	unlink(target: string): Promise<void>;
	writeState(directory: string, state: CollectionState): Promise<void>;
}

export const nodeFileOperations: FileOperations = {
	rename: (from, to) => fsp.rename(from, to),
	unlink: (target) => fsp.unlink(target),
	writeState: saveState,
};

export type ExecutionPhase = "additions" | "backup" | "removals" | "moves" | "commit" | "discard" | "restore";

export type ExecutionEvent =
	| { type: "phase"; phase: ExecutionPhase }
	| { type: "addition-start"; itemId: string; displayTitle: string; index: number; total: number }
	| { type: "addition-complete"; itemId: string; displayTitle: string; index: number; total: number; ok: boolean };

export interface ExecutePlanInput {
	directory: string;
	previous: CollectionState;
	collection: RemoteCollection;
	plan: Plan;
	retriever: Retriever;
	backups: BackupManager;
	format: MediaFormat;
	quality: QualityCeiling;
	concurrency?: number;
	/** Per item retrieval timeout, 0 disables it */
	itemTimeoutMs?: number;
	/** Files landed by an earlier unfinished update (see `loadLanded`) */
	leftovers?: ItemRecord[];
	/** Cancels pending additions; the destructive phases are not interruptible */
	signal?: AbortSignal;
	fileOps?: FileOperations;
	logger?: SyncLogger;
	onEvent?: (event: ExecutionEvent) => void;
	now?: () => Date;
}

export interface ExecutionResult {
	status: "committed" | "aborted";
	state: CollectionState;
	added: AddedItem[];
	removed: RemovedItem[];
	moved: MovedItem[];
	failed: FailedItem[];
	landed: AddedItem[];
	/** Leftover files of an earlier update deleted because their item is no longer wanted */
	discarded: string[];
	backupCreated: boolean;
	error?: string;
}

interface LandedAddition {
	addition: PlannedAddition;
	filename: string;
	format: MediaFormat;
}

interface FinalEntry extends LayoutEntry {
	itemId: string;
	target: string;
}

function disambiguate(filename: string, itemId: string, claimed: Set<string>): string {
	const ext = path.extname(filename);
	const stem = filename.slice(0, filename.length - ext.length);
	let candidate = `${stem} [${sanitizeFilename(itemId)}]${ext}`;
	for (let n = 2; claimed.has(candidate); n++) {
		candidate = `${stem} [${sanitizeFilename(itemId)}] (${n})${ext}`;
	}
	return candidate;
}

function itemSignal(signal: AbortSignal | undefined, timeoutMs: number): { signal: AbortSignal; timeout: AbortSignal | null } {
	const timeout = timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : null;
	const signals = [signal, timeout].filter((s): s is AbortSignal => s !== undefined && s !== null);
	if (signals.length === 0) {
		return { signal: new AbortController().signal, timeout };
	}
	return { signal: signals.length === 1 ? signals[0] : AbortSignal.any(signals), timeout };
}

/**
 * Apply a plan to a playlist directory.
 *
 * Additions are best effort and land before the snapshot. Removals, renames and the state
 * commit run under the snapshot: any failure there restores the directory and aborts.
 * Leftovers of an earlier unfinished update are adopted when their item is still an
 * addition and deleted with the removals otherwise.
 */
export async function executePlan(input: ExecutePlanInput): Promise<ExecutionResult> {
	const {
		directory,
		previous,
		collection,
		plan,
		retriever,
		backups,
		format,
		quality,
		concurrency = 1,
		itemTimeoutMs = 0,
		leftovers = [],
		signal,
		fileOps = nodeFileOperations,
		logger = silentLogger,
		onEvent,
		now = () => new Date(),
	} = input;

	const stagingDir = path.join(directory, STAGING_DIRNAME);
	const claimed = new Set([...previous.items, ...leftovers].map((item) => item.localFilename));
	const leftoverById = new Map(leftovers.map((record) => [record.itemId, record]));
	const landed = new Map<string, LandedAddition>();

	// Every file that may sit in the directory without a state record
	const journal = new Map(leftovers.map((record) => [record.itemId, record]));
	let journalWrite: Promise<void> = Promise.resolve();
	const persistJournal = (): Promise<void> => {
		const records = [...journal.values()];
		journalWrite = journalWrite.catch(() => undefined).then(() => saveLanded(directory, records));
		return journalWrite;
	};
	const failed: FailedItem[] = [];
	const excluded: ExcludedItem[] = [];
	const remoteSize = collection.items.length;

	await fsp.rm(stagingDir, { recursive: true, force: true });
	await fsp.mkdir(stagingDir, { recursive: true });

	try {
		// ===== PHASE 1: ADDITIONS =====
		onEvent?.({ type: "phase", phase: "additions" });
		const total = plan.additions.length;

		await processInBatches(plan.additions, concurrency, async (addition, index) => {
			const { item } = addition;

			const leftover = leftoverById.get(item.itemId);
			if (leftover) {
				landed.set(item.itemId, { addition, filename: leftover.localFilename, format: leftover.format });
				logger.info(`  ↺ ${item.displayTitle}: reusing ${leftover.localFilename}`);
				onEvent?.({ type: "addition-start", itemId: item.itemId, displayTitle: item.displayTitle, index, total });
				onEvent?.({ type: "addition-complete", itemId: item.itemId, displayTitle: item.displayTitle, index, total, ok: true });
				return;
			}

			if (signal?.aborted) {
				failed.push({ itemId: item.itemId, displayTitle: item.displayTitle, reason: "cancelled", error: "cancelled" });
				return;
			}

			onEvent?.({ type: "addition-start", itemId: item.itemId, displayTitle: item.displayTitle, index, total });
			const { signal: requestSignal, timeout } = itemSignal(signal, itemTimeoutMs);

			try {
				const artifact = await retriever.materialize({
					itemId: item.itemId,
					displayTitle: item.displayTitle,
					format,
					quality,
					stagingDir,
					signal: requestSignal,
					tags: { album: collection.title, trackNumber: addition.position + 1, totalTracks: remoteSize },
				});

				let filename = buildFilename(addition.position, remoteSize, item.displayTitle, format);
				if (claimed.has(filename)) {
					filename = disambiguate(filename, item.itemId, claimed);
				}
				// Claim before awaiting so concurrent additions never pick the same name
				claimed.add(filename);
				journal.set(item.itemId, { itemId: item.itemId, displayTitle: item.displayTitle, localFilename: filename, format });
				try {
					await persistJournal();
					await fileOps.rename(artifact, path.join(directory, filename));
				} catch (error) {
					claimed.delete(filename);
					journal.delete(item.itemId);
					throw new FilesystemFailureError("place artifact", filename, { cause: error });
				}

				landed.set(item.itemId, { addition, filename, format });
				onEvent?.({ type: "addition-complete", itemId: item.itemId, displayTitle: item.displayTitle, index, total, ok: true });
			} catch (error) {
				const failure = classifyAdditionFailure(item.itemId, item.displayTitle, error, signal, timeout);
				failed.push(failure);
				if (isPermanentItemFailure(error)) {
					excluded.push({
						itemId: item.itemId,
						displayTitle: item.displayTitle,
						reason: error instanceof AgeRestrictedError ? "age-restricted" : "unavailable",
						excludedAt: now().toISOString(),
					});
				}
				logger.warn(`  ✗ ${item.displayTitle}: ${failure.error}`);
				onEvent?.({ type: "addition-complete", itemId: item.itemId, displayTitle: item.displayTitle, index, total, ok: false });
			}
		});

		// ===== FINAL LAYOUT =====
		const entries = finalLayout(previous, collection, plan, landed);
		const renames = entries.filter((entry) => entry.target !== entry.currentFilename);
		const landedReport = entries
			.map((entry, position) => ({ entry, position }))
			.filter(({ entry }) => entry.previousPosition === null)
			.map(({ entry, position }) => ({
				itemId: entry.itemId,
				displayTitle: entry.title,
				position,
				localFilename: entry.currentFilename,
			}));

		const orphans = leftovers.filter((record) => !landed.has(record.itemId)).map((record) => record.localFilename);

		const needsBackup =
			plan.removals.length > 0 || orphans.length > 0 || renames.some((entry) => entry.previousPosition !== null);

		const abort = (error: unknown, backupCreated: boolean): ExecutionResult => ({
			status: "aborted",
			state: previous,
			added: [],
			removed: [],
			moved: [],
			failed,
			landed: landedReport,
			discarded: [],
			backupCreated,
			error: errorMessage(error),
		});

		// ===== PHASE 2: BACKUP =====
		let backup: BackupHandle | null = null;
		if (needsBackup) {
			onEvent?.({ type: "phase", phase: "backup" });
			try {
				backup = await backups.snapshot(directory);
			} catch (error) {
				logger.error(`  Snapshot of ${directory} failed, nothing was changed: ${errorMessage(error)}`);
				return abort(error, false);
			}
		}

		const nextState: CollectionState = {
			version: previous.version,
			collectionId: collection.id,
			title: collection.title,
			items: entries.map(
				(entry): ItemRecord => ({
					itemId: entry.itemId,
					displayTitle: entry.title,
					localFilename: entry.target,
					format: entry.format,
				})
			),
			excluded: mergeExcluded(previous.excluded, excluded),
			updatedAt: now().toISOString(),
		};

		try {
			// ===== PHASE 3: REMOVALS =====
			onEvent?.({ type: "phase", phase: "removals" });
			for (const removal of plan.removals) {
				const target = path.join(directory, removal.record.localFilename);
				try {
					await fileOps.unlink(target);
				} catch (error) {
					throw new FilesystemFailureError("remove", target, { cause: error });
				}
			}
			for (const orphan of orphans) {
				const target = path.join(directory, orphan);
				try {
					await fileOps.unlink(target);
				} catch (error) {
					throw new FilesystemFailureError("remove", target, { cause: error });
				}
			}

			// ===== PHASE 4: MOVES =====
			onEvent?.({ type: "phase", phase: "moves" });
			await renameInTwoPasses(directory, renames, fileOps);

			// ===== PHASE 5: STATE COMMIT =====
			onEvent?.({ type: "phase", phase: "commit" });
			await fileOps.writeState(directory, nextState);
		} catch (error) {
			if (backup) {
				onEvent?.({ type: "phase", phase: "restore" });
				logger.warn(`  Update of ${collection.title} failed, restoring backup...`);
				// RestoreFailedError propagates: the backup stays for manual recovery
				await backups.restore(backup);
				logger.info(`  Restore successful.`);
			}
			return abort(error, backup !== null);
		}

		try {
			await clearLanded(directory);
		} catch (error) {
			logger.warn(`  Could not remove the landed files journal of ${directory}: ${errorMessage(error)}`);
		}

		// ===== PHASE 6: DISCARD BACKUP =====
		if (backup) {
			onEvent?.({ type: "phase", phase: "discard" });
			try {
				await backups.commit(backup);
			} catch (error) {
				logger.warn(`  Could not remove backup ${backup.backupPath}: ${errorMessage(error)}`);
			}
		}

		const positions = new Map(previous.items.map((item, position) => [item.itemId, position]));
		return {
			status: "committed",
			state: nextState,
			added: landedReport.map((item) => ({ ...item, localFilename: entries[item.position].target })),
			removed: plan.removals.map(({ record }) => ({
				itemId: record.itemId,
				displayTitle: record.displayTitle,
				localFilename: record.localFilename,
			})),
			moved: entries.flatMap((entry, to): MovedItem[] => {
				const from = positions.get(entry.itemId);
				return from !== undefined && from !== to
					? [{ itemId: entry.itemId, displayTitle: entry.title, from, to, localFilename: entry.target }]
					: [];
			}),
			failed,
			landed: [],
			discarded: orphans,
			backupCreated: backup !== null,
		};
	} finally {
		await fsp.rm(stagingDir, { recursive: true, force: true });
	}
}

function classifyAdditionFailure(
	itemId: string,
	displayTitle: string,
	error: unknown,
	signal: AbortSignal | undefined,
	timeout: AbortSignal | null
): FailedItem {
	if (error instanceof AgeRestrictedError) {
		return { itemId, displayTitle, reason: "age-restricted", error: error.message };
	}
	if (isPermanentItemFailure(error)) {
		return { itemId, displayTitle, reason: "unavailable", error: error.message };
	}
	if (signal?.aborted) {
		return { itemId, displayTitle, reason: "cancelled", error: "cancelled" };
	}
	if (timeout?.aborted) {
		return { itemId, displayTitle, reason: "retrieval", error: "timed out" };
	}
	return { itemId, displayTitle, reason: "retrieval", error: errorMessage(error) };
}

/**
 * Remote order, keeping only items that are on disk after the additions phase
 */
function finalLayout(
	previous: CollectionState,
	collection: RemoteCollection,
	plan: Plan,
	landed: Map<string, LandedAddition>
): FinalEntry[] {
	const retained = new Map<string, { record: ItemRecord; position: number }>();
	for (const move of plan.moves) {
		retained.set(move.record.itemId, { record: move.record, position: move.from });
	}
	for (const keep of plan.unchanged) {
		retained.set(keep.record.itemId, { record: keep.record, position: keep.position });
	}

	const layout: Array<Omit<FinalEntry, "target">> = [];
	for (const item of collection.items) {
		const kept = retained.get(item.itemId);
		if (kept) {
			layout.push({
				itemId: item.itemId,
				title: kept.record.displayTitle,
				format: kept.record.format,
				currentFilename: kept.record.localFilename,
				previousPosition: kept.position,
			});
			continue;
		}

		const added = landed.get(item.itemId);
		if (added) {
			layout.push({
				itemId: item.itemId,
				title: item.displayTitle,
				format: added.format,
				currentFilename: added.filename,
				previousPosition: null,
			});
		}
	}

	const targets = layoutFilenames(layout, previous.items.length);
	return layout.map((entry, position) => ({ ...entry, target: targets[position] }));
}

function mergeExcluded(previous: ExcludedItem[], added: ExcludedItem[]): ExcludedItem[] {
	const byId = new Map(previous.map((entry) => [entry.itemId, entry]));
	for (const entry of added) {
		byId.set(entry.itemId, entry);
	}
	return [...byId.values()];
}

/**
 * Rename every file to a unique temporary name first, then to its target, so a rename never
 * overwrites a file another rename in the batch still has to move.
 */
export async function renameInTwoPasses(
	directory: string,
	renames: Array<{ currentFilename: string; target: string }>,
	fileOps: FileOperations = nodeFileOperations
): Promise<void> {
	const batch = randomBytes(4).toString("hex");
	const staged = renames.map((entry, index) => ({
		...entry,
		temporary: `${RENAME_PREFIX}${batch}-${index}`,
	}));

	for (const entry of staged) {
		const from = path.join(directory, entry.currentFilename);
		try {
			await fileOps.rename(from, path.join(directory, entry.temporary));
		} catch (error) {
			throw new FilesystemFailureError("rename", from, { cause: error });
		}
	}

	for (const entry of staged) {
		const to = path.join(directory, entry.target);
		try {
			await fileOps.rename(path.join(directory, entry.temporary), to);
		} catch (error) {
			throw new FilesystemFailureError("rename", to, { cause: error });
		}
	}
}
