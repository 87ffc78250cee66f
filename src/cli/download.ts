import pc from "picocolors";
import ora from "ora";
import { loadConfig } from "../config/index.js";
import { errorMessage } from "../errors.js";
import { checkPlaylistUrl, loadRegistry, playlistDirectory, registerPlaylist } from "../library/registry.js";
import { extractPlaylistId } from "../remote/url.js";
import { consoleLogger, logPlan, logReport, logSyncComplete, summarizeReports, writeFailureLog } from "../sync/logger.js";
import { download } from "../sync/sync.js";
import type { RemoteCollection, UpdateReport } from "../sync/types.js";
import { displayPath } from "../utils/index.js";
import {
	createProgressBar,
	createServices,
	interruptSignal,
	parseFormat,
	prelisted,
	printConfig,
	printHeader,
	progressHandler,
} from "./ui.js";

export interface DownloadCommandOptions {
	format?: string;
	dryRun?: boolean;
}

/**
 * Download new playlists into the music root. Returns the process exit code.
 */
export async function downloadCommand(inputs: string[], opts: DownloadCommandOptions): Promise<number> {
	const startTime = Date.now();
	printHeader("Download");

	const config = loadConfig();
	printConfig(config);

	const format = parseFormat(opts.format, config.music.defaultFormat);
	const { enumerator, retriever } = createServices(config);
	const signal = interruptSignal();
	const reports: UpdateReport[] = [];
	let errors = 0;

	for (const input of inputs) {
		// ===== PHASE 1: VALIDATE =====
		const collectionId = extractPlaylistId(input);
		const check = checkPlaylistUrl(loadRegistry(config.data.registryPath), input);
		if (!collectionId || check === "invalid") {
			console.log(pc.red(`  ✗ Not a playlist URL: ${input}`));
			errors++;
			continue;
		}
		if (check === "exists") {
			console.log(pc.yellow(`  ⚠ ${input} is already registered. Use "plsync sync" to update it.`));
			continue;
		}

		// ===== PHASE 2: LIST =====
		const listSpinner = ora({ text: `Fetching playlist ${pc.bold(collectionId)}...`, prefixText: " ", color: "cyan" }).start();
		let listed: RemoteCollection;
		try {
			listed = await enumerator.listCollection(collectionId, signal);
		} catch (error) {
			listSpinner.fail(pc.red(errorMessage(error)));
			writeFailureLog(config.data.failureLogPath, [
				{ playlist: input, collectionId, error: errorMessage(error), type: "listing" },
			]);
			errors++;
			continue;
		}
		const collection = listed;
		listSpinner.succeed(`Found ${pc.bold(pc.magenta(collection.title))} ${pc.dim(`(${collection.items.length} items)`)}`);

		const directory = playlistDirectory(config.music.rootPath, collection.title);
		console.log(pc.dim("  ┌─ ") + pc.bold(pc.white(collection.title)) + pc.dim(` • ${format}`));
		console.log(pc.dim("  │ ") + pc.dim(displayPath(directory)));

		// ===== PHASE 3: DOWNLOAD =====
		const progressBar = createProgressBar();
		try {
			const report = await download({
				directory,
				collectionId,
				enumerator: prelisted(collection),
				retriever,
				format,
				quality: config.quality,
				concurrency: config.sync.concurrency,
				itemTimeoutMs: config.sync.itemTimeoutSeconds * 1000,
				dryRun: opts.dryRun ?? false,
				signal,
				failureLogPath: config.data.failureLogPath,
				logger: consoleLogger,
				onPlan: opts.dryRun ? (plan) => logPlan(collection.title, plan) : undefined,
				onEvent: progressHandler(progressBar),
			});
			progressBar.stop();
			logReport(report);
			reports.push(report);

			if (!opts.dryRun && report.status === "committed") {
				registerPlaylist(config.data.registryPath, collection.title, input);
			}
		} catch (error) {
			progressBar.stop();
			console.log(pc.red(`  ✗ ${collection.title}: ${errorMessage(error)}`));
			errors++;
		}
		console.log(pc.dim("  └────────────────────────────────────────────"));
		console.log();
	}

	// ===== PHASE 4: REPORT =====
	const summary = summarizeReports(reports, Date.now() - startTime);
	logSyncComplete(summary);

	return errors > 0 || summary.aborted > 0 || summary.failed > 0 ? 1 : 0;
}
