import pc from "picocolors";
import cliProgress from "cli-progress";
import type { Config } from "../config/index.js";
import { Downloader } from "../downloader/index.js";
import type { RemoteEnumerator } from "../remote/types.js";
import { YtDlpEnumerator } from "../remote/ytdlp.js";
import type { ExecutionEvent } from "../sync/executor.js";
import { consoleLogger } from "../sync/logger.js";
import { MEDIA_FORMATS, type MediaFormat, type RemoteCollection } from "../sync/types.js";
import { displayPath } from "../utils/index.js";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

export function printHeader(subtitle: string) {
	console.log();
	console.log(pc.bold(pc.magenta("  ╭─────────────────────────────────╮")));
	console.log(pc.bold(pc.magenta("  │")) + pc.bold(pc.white(`  🎵 plsync • ${subtitle.padEnd(19)}`)) + pc.bold(pc.magenta("│")));
	console.log(pc.bold(pc.magenta("  ╰─────────────────────────────────╯")));
	console.log();
}

export function printConfig(config: Config) {
	console.log(pc.dim("  ┌─ Config ─────────────────────────────────"));
	console.log(pc.dim("  │ ") + pc.cyan("Music root: ") + pc.white(displayPath(config.music.rootPath)));
	console.log(pc.dim("  │ ") + pc.cyan("Data dir:   ") + pc.dim(config.data.dir));
	console.log(pc.dim("  └────────────────────────────────────────────"));
	console.log();
}

export function createProgressBar() {
	return new cliProgress.SingleBar({
		format: pc.dim("  │ ") + pc.cyan("{bar}") + pc.dim(" │ ") + pc.white("{percentage}%") + pc.dim(" │ ") + pc.dim("{value}/{total} items"),
		barCompleteChar: "█",
		barIncompleteChar: "░",
		hideCursor: true,
		clearOnComplete: false,
		barsize: 25,
	});
}

/**
 * Drive a progress bar from the executor's addition events
 */
export function progressHandler(bar: ReturnType<typeof createProgressBar>): (event: ExecutionEvent) => void {
	let started = false;
	let completed = 0;

	return (event) => {
		if (event.type === "addition-start" && !started) {
			bar.start(event.total, 0);
			started = true;
		} else if (event.type === "addition-complete") {
			completed++;
			bar.update(completed);
		} else if (event.type === "phase" && event.phase !== "additions" && started) {
			bar.stop();
			started = false;
		}
	};
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export function parseFormat(value: string | undefined, fallback: MediaFormat): MediaFormat {
	if (value === undefined) {
		return fallback;
	}
	const format = MEDIA_FORMATS.find((candidate) => candidate === value.toLowerCase());
	if (!format) {
		throw new Error(`Unknown format "${value}". Use one of: ${MEDIA_FORMATS.join(", ")}`);
	}
	return format;
}

export function parseConcurrency(value: string | undefined, fallback: number): number {
	const parsed = value === undefined ? fallback : parseInt(value, 10);
	return Number.isInteger(parsed) && parsed > 0 ? Math.min(parsed, 16) : fallback;
}

export function createServices(config: Config) {
	return {
		enumerator: new YtDlpEnumerator({ binary: config.ytdlp.path, logger: consoleLogger }),
		retriever: new Downloader({ binary: config.ytdlp.path, logger: consoleLogger }),
	};
}

/**
 * Enumerator answering with a listing fetched earlier in the same run
 */
export function prelisted(collection: RemoteCollection): RemoteEnumerator {
	return {
		listCollection: async () => collection,
	};
}

/**
 * AbortSignal tripped by the first Ctrl-C. Pending downloads stop, the update still commits.
 */
export function interruptSignal(): AbortSignal {
	const controller = new AbortController();
	process.once("SIGINT", () => {
		console.log(pc.yellow("\n  ⚠ Interrupted. Finishing the current update without further downloads..."));
		controller.abort();
	});
	return controller.signal;
}
