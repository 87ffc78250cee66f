import fsp from "fs/promises";
import path from "path";
import {
	AlreadyInitializedError,
	ConfirmationRequiredError,
	CorruptStateError,
	NotInitializedError,
	RecoveryRequiredError,
} from "../errors.js";
import type { QualityCeiling, RemoteEnumerator, Retriever } from "../remote/types.js";
import { BackupManager } from "./backup.js";
import { computePlan, isEmptyPlan } from "./diff.js";
import { executePlan, type ExecutionEvent, type FileOperations } from "./executor.js";
import { withDirectoryLock } from "./lock.js";
import { failureEntriesFor, silentLogger, writeFailureLog, type SyncLogger } from "./logger.js";
import { buildFilename, RENAME_PREFIX, STAGING_DIRNAME } from "./naming.js";
import { createState, excludedIds, loadLanded, loadState, stateExists, verifyState } from "./state.js";
import type { CollectionState, ItemRecord, MediaFormat, Plan, RemoteCollection, UpdateReport } from "./types.js";

export const DEFAULT_QUALITY: QualityCeiling = { maxHeight: 1080, audioQuality: 0 };

export interface SyncOptions {
	directory: string;
	collectionId: string;
	enumerator: RemoteEnumerator;
	retriever: Retriever;
	/** Output format for new items; detected from the existing items when omitted */
	format?: MediaFormat;
	/** Used when no format is given and none can be detected */
	defaultFormat?: MediaFormat;
	quality?: QualityCeiling;
	concurrency?: number;
	itemTimeoutMs?: number;
	/** Allow an empty remote listing to delete every local item */
	allowEmptyRemote?: boolean;
	/** Compute and report the plan without touching the disk */
	dryRun?: boolean;
	signal?: AbortSignal;
	failureLogPath?: string;
	logger?: SyncLogger;
	onPlan?: (plan: Plan, collection: RemoteCollection) => void;
	onEvent?: (event: ExecutionEvent) => void;
	backups?: BackupManager;
	fileOps?: FileOperations;
	now?: () => Date;
}

export type DownloadOptions = SyncOptions;

/**
 * Most common format among the committed items, or null for an empty collection
 */
export function detectFormat(state: CollectionState): MediaFormat | null {
	const counts = new Map<MediaFormat, number>();
	for (const item of state.items) {
		counts.set(item.format, (counts.get(item.format) ?? 0) + 1);
	}

	let best: MediaFormat | null = null;
	let bestCount = 0;
	for (const [format, count] of counts) {
		if (count > bestCount) {
			best = format;
			bestCount = count;
		}
	}
	return best;
}

/**
 * Restore a backup left by an interrupted transaction. Returns whether one was found.
 */
async function recoverStaleBackup(directory: string, backups: BackupManager, logger: SyncLogger): Promise<boolean> {
	const stale = await backups.findStaleBackup(directory);
	if (!stale) {
		return false;
	}

	logger.warn(`  Found an unfinished update in ${directory}, restoring ${path.basename(stale.backupPath)}...`);
	await backups.restore(stale);
	logger.info("  Restore successful.");
	return true;
}

/**
 * Remove what an interrupted run leaves behind once no backup is pending: the staging
 * area, rename temporaries and half-written or half-deleted backups
 */
async function clearScratch(directory: string, backups: BackupManager): Promise<void> {
	await backups.sweep(directory);
	await fsp.rm(path.join(directory, STAGING_DIRNAME), { recursive: true, force: true });
	for (const entry of await fsp.readdir(directory)) {
		if (entry.startsWith(RENAME_PREFIX)) {
			await fsp.rm(path.join(directory, entry), { force: true });
		}
	}
}

/**
 * Dry runs never restore; a pending backup means the directory cannot be trusted yet
 */
async function assertNoPendingRecovery(directory: string, backups: BackupManager): Promise<void> {
	const stale = await backups.findStaleBackup(directory);
	if (stale) {
		throw new RecoveryRequiredError(directory, stale.backupPath);
	}
}

function dryRunReport(
	directory: string,
	collection: RemoteCollection,
	plan: Plan,
	format: MediaFormat,
	startTime: number
): UpdateReport {
	const size = collection.items.length;
	return {
		status: "committed",
		collectionId: collection.id,
		title: collection.title,
		directory,
		dryRun: true,
		added: plan.additions.map(({ item, position }) => ({
			itemId: item.itemId,
			displayTitle: item.displayTitle,
			position,
			localFilename: buildFilename(position, size, item.displayTitle, format),
		})),
		removed: plan.removals.map(({ record }) => ({
			itemId: record.itemId,
			displayTitle: record.displayTitle,
			localFilename: record.localFilename,
		})),
		moved: plan.moves.map(({ record, from, to }) => ({
			itemId: record.itemId,
			displayTitle: record.displayTitle,
			from,
			to,
			localFilename: buildFilename(to, size, record.displayTitle, record.format),
		})),
		failed: [],
		landed: [],
		discarded: [],
		backupCreated: false,
		durationMs: Date.now() - startTime,
	};
}

/**
 * List the remote collection, plan against `previous` and apply the plan
 */
async function runUpdate(
	previous: CollectionState,
	leftovers: ItemRecord[],
	options: SyncOptions,
	startTime: number
): Promise<UpdateReport> {
	const {
		directory,
		collectionId,
		enumerator,
		retriever,
		quality = DEFAULT_QUALITY,
		concurrency = 1,
		itemTimeoutMs = 0,
		allowEmptyRemote = false,
		dryRun = false,
		signal,
		failureLogPath,
		logger = silentLogger,
		backups = new BackupManager(),
	} = options;

	// RemoteUnavailableError propagates before anything is touched
	const listed = await enumerator.listCollection(collectionId, signal);
	const skip = excludedIds(previous);
	const collection: RemoteCollection = {
		...listed,
		items: listed.items.filter((item) => !skip.has(item.itemId)),
	};

	if (collection.items.length === 0 && previous.items.length > 0 && !allowEmptyRemote) {
		throw new ConfirmationRequiredError(
			`The remote playlist "${collection.title}" is empty. Refusing to delete ` +
				`${previous.items.length} local item(s) without confirmation (allowEmptyRemote).`
		);
	}

	const plan = computePlan(previous.items, collection.items);
	options.onPlan?.(plan, collection);

	const format = options.format ?? detectFormat(previous) ?? options.defaultFormat ?? "mp3";

	if (dryRun) {
		return dryRunReport(directory, collection, plan, format, startTime);
	}

	// Nothing to do: leave the state document untouched. A never-saved state still gets written.
	if (
		isEmptyPlan(plan) &&
		leftovers.length === 0 &&
		collection.title === previous.title &&
		previous.updatedAt !== undefined
	) {
		return {
			status: "committed",
			collectionId: collection.id,
			title: collection.title,
			directory,
			dryRun: false,
			added: [],
			removed: [],
			moved: [],
			failed: [],
			landed: [],
			discarded: [],
			backupCreated: false,
			durationMs: Date.now() - startTime,
		};
	}

	const result = await executePlan({
		directory,
		previous,
		collection,
		plan,
		retriever,
		backups,
		format,
		quality,
		concurrency,
		itemTimeoutMs,
		leftovers,
		signal,
		fileOps: options.fileOps,
		logger,
		onEvent: options.onEvent,
		now: options.now,
	});

	const report: UpdateReport = {
		status: result.status,
		collectionId: collection.id,
		title: collection.title,
		directory,
		dryRun: false,
		added: result.added,
		removed: result.removed,
		moved: result.moved,
		failed: result.failed,
		landed: result.landed,
		discarded: result.discarded,
		backupCreated: result.backupCreated,
		error: result.error,
		durationMs: Date.now() - startTime,
	};

	if (failureLogPath) {
		writeFailureLog(failureLogPath, failureEntriesFor(report));
	}

	return report;
}

/**
 * Bring an already downloaded playlist directory in line with the remote playlist
 */
export async function synchronize(options: SyncOptions): Promise<UpdateReport> {
	const startTime = Date.now();
	const { directory, collectionId, logger = silentLogger, backups = new BackupManager() } = options;

	const load = async (): Promise<CollectionState> => {
		if (!stateExists(directory)) {
			throw new NotInitializedError(directory);
		}
		const previous = await loadState(directory);
		if (previous.collectionId !== collectionId) {
			throw new CorruptStateError(directory, `directory belongs to collection ${previous.collectionId}`);
		}
		verifyState(directory, previous);
		return previous;
	};

	if (options.dryRun) {
		await assertNoPendingRecovery(directory, backups);
		const previous = await load();
		return runUpdate(previous, await loadLanded(directory, previous), options, startTime);
	}

	return withDirectoryLock(directory, async () => {
		await recoverStaleBackup(directory, backups, logger);
		await clearScratch(directory, backups);
		const previous = await load();
		const leftovers = await loadLanded(directory, previous);
		return runUpdate(previous, leftovers, { ...options, backups }, startTime);
	});
}

/**
 * First download of a playlist: synchronize against an empty prior state
 */
export async function download(options: DownloadOptions): Promise<UpdateReport> {
	const startTime = Date.now();
	const { directory, collectionId, logger = silentLogger, backups = new BackupManager() } = options;

	if (options.dryRun) {
		await assertNoPendingRecovery(directory, backups);
		if (stateExists(directory)) {
			throw new AlreadyInitializedError(directory);
		}
		return runUpdate(createState(collectionId, ""), [], options, startTime);
	}

	return withDirectoryLock(directory, async () => {
		await recoverStaleBackup(directory, backups, logger);
		if (stateExists(directory)) {
			throw new AlreadyInitializedError(directory);
		}
		await clearScratch(directory, backups);
		// A first download that aborted before its state commit leaves files to adopt
		const initial = createState(collectionId, "");
		const leftovers = await loadLanded(directory, initial);
		return runUpdate(initial, leftovers, { ...options, backups }, startTime);
	});
}

/**
 * Restore a backup left behind by a crashed update, if there is one
 */
export async function recover(
	directory: string,
	options: { backups?: BackupManager; logger?: SyncLogger } = {}
): Promise<boolean> {
	const { backups = new BackupManager(), logger = silentLogger } = options;
	return withDirectoryLock(directory, () => recoverStaleBackup(directory, backups, logger));
}
