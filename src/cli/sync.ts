import pc from "picocolors";
import ora from "ora";
import { loadConfig } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { listPlaylists, type RegisteredPlaylist } from "../library/registry.js";
import { normalizePlaylistUrl } from "../remote/url.js";
import {
	consoleLogger,
	logPlan,
	logReport,
	logSyncComplete,
	logSyncStart,
	summarizeReports,
	writeFailureLog,
} from "../sync/logger.js";
import { synchronize } from "../sync/sync.js";
import type { RemoteCollection, UpdateReport } from "../sync/types.js";
import { createProgressBar, createServices, interruptSignal, parseConcurrency, prelisted, progressHandler } from "./ui.js";

export interface SyncCommandOptions {
	allowEmpty?: boolean;
	dryRun?: boolean;
	concurrency?: string;
}

/**
 * Pick registered playlists by title or URL; every one of them when nothing is named
 */
export function selectPlaylists(
	registered: RegisteredPlaylist[],
	names: string[]
): { selected: RegisteredPlaylist[]; unknown: string[] } {
	if (names.length === 0) {
		return { selected: registered, unknown: [] };
	}

	const selected: RegisteredPlaylist[] = [];
	const unknown: string[] = [];
	for (const name of names) {
		const url = normalizePlaylistUrl(name);
		const match = registered.find((playlist) => playlist.title === name || (url !== null && playlist.url === url));
		if (!match) {
			unknown.push(name);
		} else if (!selected.includes(match)) {
			selected.push(match);
		}
	}
	return { selected, unknown };
}

/**
 * Update registered playlists against their remote listings. Returns the process exit code.
 */
export async function syncCommand(names: string[], opts: SyncCommandOptions): Promise<number> {
	const startTime = Date.now();
	const config = loadConfig();
	const concurrency = parseConcurrency(opts.concurrency, config.sync.concurrency);
	const { selected, unknown } = selectPlaylists(listPlaylists(config.data.registryPath, config.music.rootPath), names);

	for (const name of unknown) {
		console.log(pc.red(`  ✗ No registered playlist named ${name}`));
	}
	if (selected.length === 0) {
		console.log(pc.yellow('  ⚠ Nothing to sync. Add playlists with "plsync download <url>".'));
		return unknown.length > 0 ? 1 : 0;
	}

	logSyncStart({ musicRootPath: config.music.rootPath, playlists: selected.length, mode: "sync" });

	const { enumerator, retriever } = createServices(config);
	const signal = interruptSignal();
	const reports: UpdateReport[] = [];
	let errors = unknown.length;

	for (const playlist of selected) {
		const spinner = ora({ text: `Checking ${pc.bold(playlist.title)}...`, prefixText: " ", color: "cyan" }).start();
		let listed: RemoteCollection;
		try {
			listed = await enumerator.listCollection(playlist.collectionId, signal);
			spinner.stop();
		} catch (error) {
			spinner.fail(pc.red(errorMessage(error)));
			writeFailureLog(config.data.failureLogPath, [
				{ playlist: playlist.title, collectionId: playlist.collectionId, error: errorMessage(error), type: "listing" },
			]);
			errors++;
			continue;
		}

		const progressBar = createProgressBar();
		try {
			const report = await synchronize({
				directory: playlist.directory,
				collectionId: playlist.collectionId,
				enumerator: prelisted(listed),
				retriever,
				defaultFormat: config.music.defaultFormat,
				quality: config.quality,
				concurrency,
				itemTimeoutMs: config.sync.itemTimeoutSeconds * 1000,
				allowEmptyRemote: opts.allowEmpty ?? config.sync.allowEmptyRemote,
				dryRun: opts.dryRun ?? false,
				signal,
				failureLogPath: config.data.failureLogPath,
				logger: consoleLogger,
				onPlan: (plan) => logPlan(playlist.title, plan),
				onEvent: progressHandler(progressBar),
			});
			progressBar.stop();
			logReport(report);
			reports.push(report);
		} catch (error) {
			progressBar.stop();
			console.log(pc.red(`  ✗ ${playlist.title}: ${errorMessage(error)}`));
			writeFailureLog(config.data.failureLogPath, [
				{ playlist: playlist.title, collectionId: playlist.collectionId, error: errorMessage(error), type: "update_aborted" },
			]);
			errors++;
		}
		console.log();
	}

	const summary = summarizeReports(reports, Date.now() - startTime);
	logSyncComplete(summary);

	return errors > 0 || summary.aborted > 0 || summary.failed > 0 ? 1 : 0;
}
