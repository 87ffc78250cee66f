import fsp from "fs/promises";
import path from "path";
import { randomBytes } from "crypto";
import { CollectionLockedError, FilesystemFailureError, errnoCode } from "../errors.js";
import { LOCK_FILENAME } from "./naming.js";

// In-process queue per directory; the lock file covers other processes
const queues = new Map<string, Promise<unknown>>();

function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: the process exists but belongs to someone else
		return errnoCode(error) === "EPERM";
	}
}

async function readLockOwner(lockPath: string): Promise<number | null> {
	try {
		const content = await fsp.readFile(lockPath, "utf-8");
		const pid = parseInt(content.trim(), 10);
		return isNaN(pid) ? null : pid;
	} catch {
		return null;
	}
}

// A lock file without a readable pid may still be in the middle of being written
const UNREADABLE_GRACE_MS = 10_000;

async function isRecent(lockPath: string): Promise<boolean> {
	try {
		const stats = await fsp.stat(lockPath);
		return Date.now() - stats.mtimeMs < UNREADABLE_GRACE_MS;
	} catch {
		return false;
	}
}

/**
 * Move a dead owner's lock out of the way. The rename lets only one contender take it; a
 * contender that finds it moved a fresh lock instead puts that lock back and reports false.
 */
export async function takeOverStaleLock(lockPath: string, deadOwner: number | null): Promise<boolean> {
	const aside = `${lockPath}.${randomBytes(4).toString("hex")}.stale`;
	try {
		await fsp.rename(lockPath, aside);
	} catch (error) {
		if (errnoCode(error) === "ENOENT") {
			// Someone else moved it first; the caller retries the exclusive create
			return true;
		}
		throw new FilesystemFailureError("take over lock", lockPath, { cause: error });
	}

	try {
		if ((await readLockOwner(aside)) === deadOwner) {
			return true;
		}
		await fsp.link(aside, lockPath);
		return false;
	} catch (error) {
		throw new FilesystemFailureError("take over lock", lockPath, { cause: error });
	} finally {
		await fsp.rm(aside, { force: true });
	}
}

async function acquireLockFile(directory: string): Promise<string> {
	const lockPath = path.join(directory, LOCK_FILENAME);

	for (let attempt = 0; attempt < 2; attempt++) {
		try {
			const handle = await fsp.open(lockPath, "wx");
			try {
				await handle.writeFile(String(process.pid), "utf-8");
			} finally {
				await handle.close();
			}
			return lockPath;
		} catch (error) {
			if (errnoCode(error) !== "EEXIST") {
				throw new FilesystemFailureError("lock", lockPath, { cause: error });
			}
		}

		const owner = await readLockOwner(lockPath);
		const held = owner === null ? await isRecent(lockPath) : owner !== process.pid && isProcessAlive(owner);
		if (held) {
			throw new CollectionLockedError(directory, owner);
		}
		// Left behind by a dead process
		if (!(await takeOverStaleLock(lockPath, owner))) {
			throw new CollectionLockedError(directory, await readLockOwner(lockPath));
		}
	}

	throw new CollectionLockedError(directory, await readLockOwner(lockPath));
}

/**
 * Run `fn` while holding the single-writer lock of a collection directory
 */
export async function withDirectoryLock<T>(directory: string, fn: () => Promise<T>): Promise<T> {
	const key = path.resolve(directory);
	const previous = queues.get(key) ?? Promise.resolve();

	const run = previous.catch(() => undefined).then(async () => {
		await fsp.mkdir(key, { recursive: true });
		const lockPath = await acquireLockFile(key);
		try {
			return await fn();
		} finally {
			await fsp.rm(lockPath, { force: true });
		}
	});

	queues.set(key, run);
	try {
		return await run;
	} finally {
		if (queues.get(key) === run) {
			queues.delete(key);
		}
	}
}
