import path from "path";
import pc from "picocolors";
import ora from "ora";
import { loadConfig } from "../config/index.js";
import {
	checkPlaylistUrl,
	deleteAppData,
	listPlaylists,
	loadRegistry,
	registerPlaylist,
	unregisterPlaylist,
} from "../library/registry.js";
import { normalizeVideoUrl } from "../remote/url.js";
import { consoleLogger, writeFailureLog } from "../sync/logger.js";
import { recover } from "../sync/sync.js";
import { displayPath } from "../utils/index.js";
import { createServices, parseFormat, printHeader } from "./ui.js";

/**
 * Download single videos into the music root
 */
export async function videoCommand(urls: string[], opts: { format?: string }): Promise<number> {
	printHeader("Video");
	const config = loadConfig();
	const format = parseFormat(opts.format, config.music.defaultFormat);
	const { retriever } = createServices(config);
	let failed = 0;

	for (const input of urls) {
		const url = normalizeVideoUrl(input);
		if (!url) {
			console.log(pc.red(`  ✗ Not a video URL: ${input}`));
			failed++;
			continue;
		}

		const spinner = ora({ text: `Downloading ${pc.bold(url)}...`, prefixText: " ", color: "cyan" }).start();
		const result = await retriever.downloadVideo({
			url,
			format,
			quality: config.quality,
			outputDir: config.music.rootPath,
		});

		if (result.success && result.filePath) {
			spinner.succeed(`${pc.bold(result.title)} ${pc.dim(displayPath(result.filePath))}`);
		} else {
			spinner.fail(pc.red(`${result.title}: ${result.error ?? "Unknown error"}`));
			writeFailureLog(config.data.failureLogPath, [
				{ playlist: "(single video)", itemTitle: input, error: result.error ?? "Unknown error", type: "item_download" },
			]);
			failed++;
		}
	}

	return failed > 0 ? 1 : 0;
}

/**
 * Restore a backup left behind by an interrupted update
 */
export async function recoverCommand(directory: string): Promise<number> {
	const target = path.resolve(directory);
	const spinner = ora({ text: `Looking for an unfinished update in ${displayPath(target)}...`, prefixText: " ", color: "cyan" }).start();
	const restored = await recover(target, { logger: consoleLogger });

	if (restored) {
		spinner.succeed(pc.green("Directory restored from its backup."));
	} else {
		spinner.info("No backup found. Nothing to recover.");
	}
	return 0;
}

export function listPlaylistsCommand(): number {
	const config = loadConfig();
	const playlists = listPlaylists(config.data.registryPath, config.music.rootPath);

	if (playlists.length === 0) {
		console.log(pc.dim("  No playlists registered."));
		return 0;
	}

	console.log(pc.dim("  ┌─ Playlists ─────────────────────────────────"));
	for (const playlist of playlists) {
		console.log(pc.dim("  │ ") + pc.white(playlist.title) + pc.dim(` ${playlist.url}`));
	}
	console.log(pc.dim("  └───────────────────────────────────────────────"));
	return 0;
}

export function addPlaylistCommand(title: string, url: string): number {
	const config = loadConfig();
	const check = checkPlaylistUrl(loadRegistry(config.data.registryPath), url);

	if (check === "invalid") {
		console.log(pc.red(`  ✗ Not a playlist URL: ${url}`));
		return 1;
	}
	const canonical = registerPlaylist(config.data.registryPath, title, url);
	console.log(pc.green(`  ✓ ${check === "exists" ? "Renamed" : "Added"} ${pc.bold(title)} ${pc.dim(canonical)}`));
	return 0;
}

export function removePlaylistCommand(titleOrUrl: string): number {
	const config = loadConfig();
	if (!unregisterPlaylist(config.data.registryPath, titleOrUrl)) {
		console.log(pc.yellow(`  ⚠ No registered playlist matches ${titleOrUrl}`));
		return 1;
	}
	console.log(pc.green(`  ✓ Removed ${pc.bold(titleOrUrl)}. Downloaded files were kept.`));
	return 0;
}

export function resetCommand(opts: { yes?: boolean }): number {
	const config = loadConfig();
	if (!opts.yes) {
		console.log(pc.yellow(`  ⚠ This deletes ${config.data.dir} (registry and failure log). Re-run with --yes to confirm.`));
		return 1;
	}
	const deleted = deleteAppData(config.data.dir);
	console.log(deleted ? pc.green("  ✓ Application data deleted.") : pc.dim("  No application data found."));
	return 0;
}
