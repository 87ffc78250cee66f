// Engine
export { synchronize, download, recover, detectFormat, DEFAULT_QUALITY } from "../sync/sync.js";
export type { SyncOptions, DownloadOptions } from "../sync/sync.js";

// Building blocks
export { computePlan, isEmptyPlan, isDestructive } from "../sync/diff.js";
export { executePlan, renameInTwoPasses, nodeFileOperations } from "../sync/executor.js";
export type { ExecutePlanInput, ExecutionResult, ExecutionEvent, ExecutionPhase, FileOperations } from "../sync/executor.js";
export { BackupManager, listBackups } from "../sync/backup.js";
export type { BackupHandle } from "../sync/backup.js";
export { withDirectoryLock } from "../sync/lock.js";

// State management
export {
	loadState,
	saveState,
	createState,
	stateExists,
	statePath,
	verifyState,
	findMissingFiles,
	loadLanded,
	landedPath,
	STATE_VERSION,
} from "../sync/state.js";
export {
	buildFilename,
	orderingToken,
	tokenWidth,
	sanitizeFilename,
	STATE_FILENAME,
	LOCK_FILENAME,
	STAGING_DIRNAME,
	LANDED_FILENAME,
} from "../sync/naming.js";
export * from "../sync/types.js";

// Logging
export { loadFailureLog, writeFailureLog, clearFailureLog, consoleLogger, silentLogger } from "../sync/logger.js";
export type { SyncLogger, FailureLogEntry, RunSummary } from "../sync/logger.js";

// Errors
export * from "../errors.js";

// Remote access
export { YtDlpEnumerator } from "../remote/ytdlp.js";
export { parseListing } from "../remote/listing.js";
export { extractPlaylistId, normalizePlaylistUrl, normalizeVideoUrl, playlistUrl, videoUrl } from "../remote/url.js";
export type { RemoteEnumerator, Retriever, MaterializeRequest, QualityCeiling } from "../remote/types.js";
export { Downloader, buildFormatArgs, classifyYtDlpError } from "../downloader/index.js";
export type { DownloadResult, DownloaderOptions } from "../downloader/index.js";

// Playlist registry
export {
	loadRegistry,
	checkPlaylistUrl,
	registerPlaylist,
	unregisterPlaylist,
	listPlaylists,
	playlistDirectory,
	deleteAppData,
} from "../library/registry.js";
export type { Registry, RegisteredPlaylist, UrlCheck } from "../library/registry.js";

// Config
export { loadConfig, defaultDataDir } from "../config/index.js";
export type { Config } from "../config/index.js";
