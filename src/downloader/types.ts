import { z } from "zod";
import type { MediaFormat } from "../sync/types.js";
import type { QualityCeiling } from "../remote/types.js";
import type { SyncLogger } from "../sync/logger.js";

export interface TrackTagInfo {
	title: string;
	artist?: string;
	album?: string;
	trackNumber?: number;
	totalTracks?: number;
	uploadDate?: string; // YYYYMMDD
}

/** Fields of the yt-dlp info JSON used for tagging */
export const videoInfoSchema = z.object({
	id: z.string(),
	title: z.string().nullish(),
	uploader: z.string().nullish(),
	channel: z.string().nullish(),
	upload_date: z.string().nullish(),
	thumbnail: z.string().url().nullish(),
});

export type VideoInfo = z.infer<typeof videoInfoSchema>;

export interface DownloaderOptions {
	/** Path of the yt-dlp executable */
	binary?: string;
	/** Embed ID3 tags and cover art into mp3 output */
	tag?: boolean;
	logger?: SyncLogger;
}

export interface DownloadResult {
	success: boolean;
	itemId: string;
	title: string;
	filePath?: string;
	error?: string;
}

export interface VideoDownloadRequest {
	url: string;
	format: MediaFormat;
	quality: QualityCeiling;
	outputDir: string;
	signal?: AbortSignal;
}

export function isVideoFormat(format: MediaFormat): boolean {
	return format === "mp4" || format === "mkv" || format === "webm";
}

export function thumbnailUrl(itemId: string): string {
	return `https://i.ytimg.com/vi/${itemId}/hqdefault.jpg`;
}
