import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import {
	AgeRestrictedError,
	ItemUnavailableError,
	RetrievalFailedError,
	errorMessage,
	type SyncError,
} from "../errors.js";
import { lastErrorLine, runYtDlp, type YtDlpOutput } from "../remote/ytdlp.js";
import type { MaterializeRequest, QualityCeiling, Retriever, TagInfo } from "../remote/types.js";
import { videoUrl } from "../remote/url.js";
import { sanitizeFilename, STAGING_DIRNAME } from "../sync/naming.js";
import type { MediaFormat } from "../sync/types.js";
import type { SyncLogger } from "../sync/logger.js";
import { downloadCover, tagTrack } from "./tagger.js";
import {
	isVideoFormat,
	thumbnailUrl,
	videoInfoSchema,
	type DownloaderOptions,
	type DownloadResult,
	type VideoDownloadRequest,
	type VideoInfo,
} from "./types.js";

const AGE_RESTRICTED_PATTERNS = [/confirm your age/i, /age[- ]restricted/i, /inappropriate for some users/i];

const UNAVAILABLE_PATTERNS = [
	/video unavailable/i,
	/private video/i,
	/has been removed/i,
	/account associated with this video has been terminated/i,
	/not available in your country/i,
	/members-only/i,
];

/**
 * yt-dlp arguments selecting the output format under the quality ceiling
 */
export function buildFormatArgs(format: MediaFormat, quality: QualityCeiling): string[] {
	if (isVideoFormat(format)) {
		const height = quality.maxHeight;
		return [
			"-f",
			`bestvideo[height<=${height}]+bestaudio/best[height<=${height}]/best`,
			"--merge-output-format",
			format,
			"--remux-video",
			format,
		];
	}

	return ["-f", "bestaudio/best", "-x", "--audio-format", format, "--audio-quality", String(quality.audioQuality)];
}

/**
 * Map a failed yt-dlp run to the error taxonomy
 */
export function classifyYtDlpError(itemId: string, stderr: string): SyncError {
	if (AGE_RESTRICTED_PATTERNS.some((pattern) => pattern.test(stderr))) {
		return new AgeRestrictedError(itemId);
	}
	if (UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(stderr))) {
		return new ItemUnavailableError(itemId, lastErrorLine(stderr));
	}
	return new RetrievalFailedError(itemId, lastErrorLine(stderr));
}

function parseVideoInfo(stdout: string): VideoInfo | null {
	const firstLine = stdout.split("\n").find((line) => line.trim().startsWith("{"));
	if (!firstLine) {
		return null;
	}
	try {
		const parsed = videoInfoSchema.safeParse(JSON.parse(firstLine));
		return parsed.success ? parsed.data : null;
	} catch {
		return null;
	}
}

/**
 * Retrieves, converts and tags single items with yt-dlp
 */
export class Downloader implements Retriever {
	private binary: string;
	private tag: boolean;
	private logger?: SyncLogger;

	constructor(options: DownloaderOptions = {}) {
		this.binary = options.binary ?? "yt-dlp";
		this.tag = options.tag ?? true;
		this.logger = options.logger;
	}

	async materialize(request: MaterializeRequest): Promise<string> {
		const { filePath } = await this.fetch(
			request.itemId,
			request.displayTitle,
			request.format,
			request.quality,
			request.stagingDir,
			request.signal,
			request.tags
		);
		return filePath;
	}

	/**
	 * Download one video straight into `outputDir` as "<title>.<format>"
	 */
	async downloadVideo(request: VideoDownloadRequest): Promise<DownloadResult> {
		const itemId = new URL(request.url).searchParams.get("v") ?? "";
		if (!itemId) {
			return { success: false, itemId: "", title: request.url, error: "Not a video URL" };
		}

		const stagingDir = path.join(request.outputDir, STAGING_DIRNAME);
		try {
			await fsp.mkdir(stagingDir, { recursive: true });
			const { filePath, info } = await this.fetch(
				itemId,
				itemId,
				request.format,
				request.quality,
				stagingDir,
				request.signal ?? new AbortController().signal
			);

			const title = info?.title?.trim() || itemId;
			const target = path.join(request.outputDir, `${sanitizeFilename(title)}.${request.format}`);
			await fsp.rename(filePath, target);
			return { success: true, itemId, title, filePath: target };
		} catch (error) {
			return { success: false, itemId, title: itemId, error: errorMessage(error) };
		} finally {
			await fsp.rm(stagingDir, { recursive: true, force: true });
		}
	}

	private async fetch(
		itemId: string,
		displayTitle: string,
		format: MediaFormat,
		quality: QualityCeiling,
		stagingDir: string,
		signal: AbortSignal,
		tags?: TagInfo
	): Promise<{ filePath: string; info: VideoInfo | null }> {
		const base = sanitizeFilename(itemId);
		const filePath = path.join(stagingDir, `${base}.${format}`);
		const args = [
			"--no-playlist",
			"--no-warnings",
			"--no-progress",
			"-j",
			"--no-simulate",
			...buildFormatArgs(format, quality),
			"-o",
			path.join(stagingDir, `${base}.%(ext)s`),
			videoUrl(itemId),
		];

		let output: YtDlpOutput;
		try {
			output = await runYtDlp(this.binary, args, signal);
		} catch (error) {
			if (signal.aborted) {
				throw error;
			}
			throw new RetrievalFailedError(itemId, errorMessage(error), { cause: error });
		}

		if (output.code !== 0) {
			throw classifyYtDlpError(itemId, output.stderr);
		}
		if (!fs.existsSync(filePath)) {
			throw new RetrievalFailedError(itemId, `no ${format} file was produced`);
		}

		const info = parseVideoInfo(output.stdout);
		if (this.tag && format === "mp3") {
			const cover = await downloadCover(info?.thumbnail ?? thumbnailUrl(itemId), signal);
			await tagTrack(
				filePath,
				{
					title: displayTitle === itemId && info?.title ? info.title : displayTitle,
					artist: info?.uploader ?? info?.channel ?? undefined,
					album: tags?.album,
					trackNumber: tags?.trackNumber,
					totalTracks: tags?.totalTracks,
					uploadDate: info?.upload_date ?? undefined,
				},
				cover,
				undefined,
				this.logger
			);
		}

		return { filePath, info };
	}
}
