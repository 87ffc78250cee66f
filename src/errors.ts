/**
 * Error taxonomy for playlist synchronization.
 * Every error carries a stable `code` so callers can branch without instanceof chains.
 */

export type SyncErrorCode =
	| "REMOTE_UNAVAILABLE"
	| "RETRIEVAL_FAILED"
	| "AGE_RESTRICTED"
	| "ITEM_UNAVAILABLE"
	| "FILESYSTEM_FAILURE"
	| "CORRUPT_STATE"
	| "RESTORE_FAILED"
	| "RECOVERY_REQUIRED"
	| "CONFIRMATION_REQUIRED"
	| "COLLECTION_LOCKED"
	| "NOT_INITIALIZED"
	| "ALREADY_INITIALIZED";

export class SyncError extends Error {
	readonly code: SyncErrorCode;

	constructor(code: SyncErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** The remote collection could not be listed. Nothing was changed. */
export class RemoteUnavailableError extends SyncError {
	constructor(collectionId: string, reason: string, options?: { cause?: unknown }) {
		super("REMOTE_UNAVAILABLE", `Could not list collection ${collectionId}: ${reason}`, options);
	}
}

export class RetrievalFailedError extends SyncError {
	readonly itemId: string;

	constructor(itemId: string, reason: string, options?: { cause?: unknown }) {
		super("RETRIEVAL_FAILED", `Retrieval of ${itemId} failed: ${reason}`, options);
		this.itemId = itemId;
	}
}

export class AgeRestrictedError extends SyncError {
	readonly itemId: string;

	constructor(itemId: string) {
		super("AGE_RESTRICTED", `Item ${itemId} is age restricted`);
		this.itemId = itemId;
	}
}

export class ItemUnavailableError extends SyncError {
	readonly itemId: string;

	constructor(itemId: string, reason = "unavailable") {
		super("ITEM_UNAVAILABLE", `Item ${itemId} is ${reason}`);
		this.itemId = itemId;
	}
}

export class FilesystemFailureError extends SyncError {
	readonly operation: string;
	readonly path: string;

	constructor(operation: string, path: string, options?: { cause?: unknown }) {
		const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
		super("FILESYSTEM_FAILURE", `${operation} failed for ${path}${reason}`, options);
		this.operation = operation;
		this.path = path;
	}
}

/** The state document is unreadable or out of step with the directory. Needs manual resolution. */
export class CorruptStateError extends SyncError {
	readonly directory: string;
	readonly missingFiles: string[];

	constructor(directory: string, reason: string, missingFiles: string[] = [], options?: { cause?: unknown }) {
		super("CORRUPT_STATE", `Corrupt state in ${directory}: ${reason}`, options);
		this.directory = directory;
		this.missingFiles = missingFiles;
	}
}

export class RestoreFailedError extends SyncError {
	readonly backupPath: string;

	constructor(directory: string, backupPath: string, options?: { cause?: unknown }) {
		const reason = options?.cause instanceof Error ? ` (${options.cause.message})` : "";
		super(
			"RESTORE_FAILED",
			`Could not restore ${directory}${reason}. The backup was left in place at ${backupPath}; ` +
				`copy its contents back over the directory by hand or run "plsync recover".`,
			options
		);
		this.backupPath = backupPath;
	}
}

/** A crashed update left a backup that has not been restored yet */
export class RecoveryRequiredError extends SyncError {
	readonly backupPath: string;

	constructor(directory: string, backupPath: string) {
		super(
			"RECOVERY_REQUIRED",
			`${directory} has an unfinished update (backup at ${backupPath}). ` +
				`Run "plsync recover" or a normal sync to restore it first.`
		);
		this.backupPath = backupPath;
	}
}

export class ConfirmationRequiredError extends SyncError {
	constructor(message: string) {
		super("CONFIRMATION_REQUIRED", message);
	}
}

export class CollectionLockedError extends SyncError {
	readonly pid: number | null;

	constructor(directory: string, pid: number | null) {
		super(
			"COLLECTION_LOCKED",
			`${directory} is being updated by another process${pid !== null ? ` (pid ${pid})` : ""}`
		);
		this.pid = pid;
	}
}

export class NotInitializedError extends SyncError {
	constructor(directory: string) {
		super("NOT_INITIALIZED", `No playlist state found in ${directory}. Use download first.`);
	}
}

export class AlreadyInitializedError extends SyncError {
	constructor(directory: string) {
		super("ALREADY_INITIALIZED", `${directory} already holds a playlist. Use sync to update it.`);
	}
}

/**
 * Per-item failures that mean the item can never be fetched and should not be retried
 */
export function isPermanentItemFailure(error: unknown): error is AgeRestrictedError | ItemUnavailableError {
	return error instanceof AgeRestrictedError || error instanceof ItemUnavailableError;
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * The `code` of a Node system error ("ENOENT", "EEXIST", ...), if there is one
 */
export function errnoCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
