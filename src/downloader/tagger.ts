import NodeID3 from "node-id3";
import got from "got";
import type { SyncLogger } from "../sync/logger.js";
import type { TrackTagInfo } from "./types.js";

export interface TagOptions {
	title?: boolean;
	artist?: boolean;
	album?: boolean;
	trackNumber?: boolean;
	year?: boolean;
	cover?: boolean;
}

const DEFAULT_TAG_OPTIONS: TagOptions = {
	title: true,
	artist: true,
	album: true,
	trackNumber: true,
	year: true,
	cover: true,
};

/**
 * Build the ID3 frames for a track
 */
export function buildTags(track: TrackTagInfo, cover?: Buffer, options: TagOptions = DEFAULT_TAG_OPTIONS): NodeID3.Tags {
	const tags: NodeID3.Tags = {};

	if (options.title && track.title) {
		tags.title = track.title;
	}

	if (options.artist && track.artist) {
		tags.artist = track.artist;
	}

	if (options.album && track.album) {
		tags.album = track.album;
	}

	if (options.trackNumber && track.trackNumber) {
		tags.trackNumber = track.totalTracks ? `${track.trackNumber}/${track.totalTracks}` : String(track.trackNumber);
	}

	if (options.year && track.uploadDate) {
		const year = track.uploadDate.slice(0, 4);
		if (/^\d{4}$/.test(year)) tags.year = year;
	}

	if (options.cover && cover) {
		tags.image = {
			mime: "image/jpeg",
			type: { id: 3, name: "front cover" },
			description: "Cover",
			imageBuffer: cover,
		};
	}

	return tags;
}

/**
 * Write tags to a finished file. Only mp3 carries ID3 frames; other formats are left untouched.
 */
export async function tagTrack(
	filePath: string,
	track: TrackTagInfo,
	cover?: Buffer,
	options: TagOptions = DEFAULT_TAG_OPTIONS,
	logger?: SyncLogger
): Promise<boolean> {
	const extension = filePath.toLowerCase().split(".").pop() || "";
	if (extension !== "mp3") {
		return false;
	}

	const result = NodeID3.write(buildTags(track, cover, options), filePath);
	if (result !== true) {
		logger?.warn(`  Warning: Failed to write tags to ${filePath}`);
		return false;
	}
	return true;
}

/**
 * Fetch cover art; a missing cover never fails the download
 */
export async function downloadCover(url: string, signal?: AbortSignal): Promise<Buffer | undefined> {
	try {
		const response = await got(url, {
			responseType: "buffer",
			timeout: { request: 10000 },
			signal,
		});
		return response.body;
	} catch {
		return undefined;
	}
}
