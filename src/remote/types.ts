import type { MediaFormat, RemoteCollection } from "../sync/types.js";

export interface QualityCeiling {
	/** Highest video height to fetch, in pixels */
	maxHeight: number;
	/** yt-dlp audio quality, 0 (best) to 10 (worst) */
	audioQuality: number;
}

export interface TagInfo {
	album: string;
	trackNumber: number;
	totalTracks: number;
}

export interface MaterializeRequest {
	itemId: string;
	displayTitle: string;
	format: MediaFormat;
	quality: QualityCeiling;
	/** Directory the finished artifact must be written to */
	stagingDir: string;
	signal: AbortSignal;
	tags?: TagInfo;
}

/**
 * Lists a remote collection in order, with unavailable items already excluded
 */
export interface RemoteEnumerator {
	listCollection(collectionId: string, signal?: AbortSignal): Promise<RemoteCollection>;
}

/**
 * Produces the finished, tagged media file for one item and returns its path in the staging dir
 */
export interface Retriever {
	materialize(request: MaterializeRequest): Promise<string>;
}
