export const AUDIO_FORMATS = ["mp3", "m4a", "flac", "opus", "wav"] as const;
export const VIDEO_FORMATS = ["mp4", "mkv", "webm"] as const;
export const MEDIA_FORMATS = [...AUDIO_FORMATS, ...VIDEO_FORMATS] as const;

export type MediaFormat = (typeof MEDIA_FORMATS)[number];

export interface ItemRecord {
	itemId: string;
	displayTitle: string;
	localFilename: string;
	format: MediaFormat;
}

export type ExclusionReason = "age-restricted" | "unavailable";

export interface ExcludedItem {
	itemId: string;
	displayTitle: string;
	reason: ExclusionReason;
	excludedAt: string; // ISO timestamp
}

export interface CollectionState {
	version: number; // For future migrations
	collectionId: string;
	title: string;
	items: ItemRecord[];
	excluded: ExcludedItem[];
	updatedAt?: string; // ISO timestamp
}

/** One entry of a remote listing, already validated at the enumerator boundary. */
export interface RemoteItem {
	itemId: string;
	displayTitle: string;
}

export interface RemoteCollection {
	id: string;
	title: string;
	items: RemoteItem[];
}

export interface PlannedAddition {
	item: RemoteItem;
	position: number;
}

export interface PlannedRemoval {
	record: ItemRecord;
	position: number;
}

export interface PlannedMove {
	record: ItemRecord;
	from: number;
	to: number;
}

export interface PlannedKeep {
	record: ItemRecord;
	position: number;
}

export interface Plan {
	additions: PlannedAddition[];
	removals: PlannedRemoval[];
	moves: PlannedMove[];
	unchanged: PlannedKeep[];
}

export interface AddedItem {
	itemId: string;
	displayTitle: string;
	position: number;
	localFilename: string;
}

export interface RemovedItem {
	itemId: string;
	displayTitle: string;
	localFilename: string;
}

export interface MovedItem {
	itemId: string;
	displayTitle: string;
	from: number;
	to: number;
	localFilename: string;
}

export type FailureReason = "retrieval" | "age-restricted" | "unavailable" | "cancelled";

export interface FailedItem {
	itemId: string;
	displayTitle: string;
	reason: FailureReason;
	error: string;
}

export interface UpdateReport {
	status: "committed" | "aborted";
	collectionId: string;
	title: string;
	directory: string;
	dryRun: boolean;
	added: AddedItem[];
	removed: RemovedItem[];
	moved: MovedItem[];
	failed: FailedItem[];
	/** Additions written to disk before an abort; present as files but not claimed by the state. */
	landed: AddedItem[];
	/** Files left by an earlier unfinished update, deleted because their item is no longer wanted. */
	discarded: string[];
	backupCreated: boolean;
	error?: string;
	durationMs: number;
}
