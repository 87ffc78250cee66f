import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { randomBytes } from "crypto";
import { FilesystemFailureError, RestoreFailedError, errnoCode } from "../errors.js";
import { BACKUP_MARKER, DISCARD_SUFFIX, LOCK_FILENAME, PARTIAL_SUFFIX, STAGING_DIRNAME } from "./naming.js";

export interface BackupHandle {
	directory: string;
	backupPath: string;
	createdAt: Date;
}

/** Entries of the working directory that never go into a snapshot and survive a restore. */
const TRANSIENT_ENTRIES = new Set([LOCK_FILENAME, STAGING_DIRNAME]);

function backupPrefix(directory: string): string {
	const resolved = path.resolve(directory);
	return path.join(path.dirname(resolved), `.${path.basename(resolved)}${BACKUP_MARKER}`);
}

function uniqueStamp(date: Date): string {
	const compact = date.toISOString().replace(/[-:.TZ]/g, "").slice(0, 14);
	return `${compact}-${randomBytes(3).toString("hex")}`;
}

/** Backups being written (".partial") or deleted (".discard") */
function isIncomplete(name: string): boolean {
	return name.endsWith(PARTIAL_SUFFIX) || name.endsWith(DISCARD_SUFFIX);
}

/**
 * Complete backups left beside a directory, oldest first.
 * Interrupted copies and interrupted discards are not backups and are ignored.
 */
export async function listBackups(directory: string): Promise<string[]> {
	const prefix = backupPrefix(directory);
	const parent = path.dirname(prefix);
	const marker = path.basename(prefix);

	let entries: fs.Dirent[];
	try {
		entries = await fsp.readdir(parent, { withFileTypes: true });
	} catch {
		return [];
	}

	return entries
		.filter((entry) => entry.isDirectory() && entry.name.startsWith(marker) && !isIncomplete(entry.name))
		.map((entry) => path.join(parent, entry.name))
		.sort();
}

/**
 * Full-copy snapshots of a playlist directory, stored as a hidden sibling.
 */
export class BackupManager {
	private now: () => Date;

	constructor(options: { now?: () => Date } = {}) {
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Copy the directory to a new backup. Nothing is changed in the working directory.
	 */
	async snapshot(directory: string): Promise<BackupHandle> {
		const createdAt = this.now();
		const backupPath = `${backupPrefix(directory)}${uniqueStamp(createdAt)}`;
		const partialPath = `${backupPath}${PARTIAL_SUFFIX}`;

		try {
			await this.sweep(directory);
			await fsp.cp(directory, partialPath, {
				recursive: true,
				errorOnExist: true,
				force: false,
				preserveTimestamps: true,
				filter: (source) => {
					const relative = path.relative(directory, source);
					return !TRANSIENT_ENTRIES.has(relative.split(path.sep)[0]);
				},
			});
			await fsp.rename(partialPath, backupPath);
		} catch (error) {
			await fsp.rm(partialPath, { recursive: true, force: true });
			throw new FilesystemFailureError("snapshot", directory, { cause: error });
		}

		return { directory, backupPath, createdAt };
	}

	/**
	 * Discard the backup after a successful commit.
	 * The rename takes it out of `listBackups` first, so a half-deleted copy is never restored.
	 */
	async commit(handle: BackupHandle): Promise<void> {
		const discardPath = `${handle.backupPath}${DISCARD_SUFFIX}`;
		try {
			if (fs.existsSync(handle.backupPath)) {
				await fsp.rename(handle.backupPath, discardPath);
			}
			await fsp.rm(discardPath, { recursive: true, force: true });
		} catch (error) {
			throw new FilesystemFailureError("discard backup", handle.backupPath, { cause: error });
		}
	}

	/**
	 * Put the working directory back to the snapshot, then discard the backup.
	 * Running it again once it has completed is a no-op.
	 */
	async restore(handle: BackupHandle): Promise<void> {
		const { directory, backupPath } = handle;
		if (!fs.existsSync(backupPath)) {
			return;
		}

		try {
			await fsp.mkdir(directory, { recursive: true });
			const entries = await fsp.readdir(directory);
			for (const entry of entries) {
				if (TRANSIENT_ENTRIES.has(entry)) {
					continue;
				}
				await fsp.rm(path.join(directory, entry), { recursive: true, force: true });
			}

			await fsp.cp(backupPath, directory, {
				recursive: true,
				force: true,
				preserveTimestamps: true,
			});
		} catch (error) {
			throw new RestoreFailedError(directory, backupPath, { cause: error });
		}

		await this.commit(handle);
	}

	/**
	 * A backup left behind by an interrupted transaction, if any (most recent wins)
	 */
	async findStaleBackup(directory: string): Promise<BackupHandle | null> {
		const backups = await listBackups(directory);
		const latest = backups[backups.length - 1];
		if (!latest) {
			return null;
		}
		const stats = await fsp.stat(latest);
		return { directory, backupPath: latest, createdAt: stats.mtime };
	}

	/**
	 * Delete interrupted copies and interrupted discards left beside the directory
	 */
	async sweep(directory: string): Promise<void> {
		const prefix = backupPrefix(directory);
		const parent = path.dirname(prefix);
		const marker = path.basename(prefix);

		let entries: string[];
		try {
			entries = await fsp.readdir(parent);
		} catch (error) {
			if (errnoCode(error) === "ENOENT") {
				return;
			}
			throw error;
		}

		for (const entry of entries) {
			if (entry.startsWith(marker) && isIncomplete(entry)) {
				await fsp.rm(path.join(parent, entry), { recursive: true, force: true });
			}
		}
	}
}
