import type { MediaFormat } from "./types.js";

/** Reserved names the engine owns inside and beside a collection directory. */
export const STATE_FILENAME = ".plsync-state.json";
export const LOCK_FILENAME = ".plsync.lock";
export const STAGING_DIRNAME = ".plsync-staging";
export const BACKUP_MARKER = ".plsync-backup-";
export const PARTIAL_SUFFIX = ".partial";
export const DISCARD_SUFFIX = ".discard";
export const LANDED_FILENAME = ".plsync-landed.json";
export const RENAME_PREFIX = ".plsync-rename-";

export function isReservedName(name: string): boolean {
	return name === STATE_FILENAME || name === LOCK_FILENAME || name === STAGING_DIRNAME || name.startsWith(".plsync");
}

/**
 * Number of digits an ordering token needs for a collection of `size` items
 */
export function tokenWidth(size: number): number {
	return String(Math.max(size, 1)).length;
}

/**
 * Ordering token for a 0-based position: 1-based and zero-padded to the width of the collection
 */
export function orderingToken(position: number, size: number): string {
	if (!Number.isInteger(position) || position < 0 || position >= size) {
		throw new RangeError(`Position ${position} outside collection of ${size}`);
	}
	return String(position + 1).padStart(tokenWidth(size), "0");
}

/**
 * Sanitize a string for use as a file name
 */
export function sanitizeFilename(name: string): string {
	const cleaned = name
		.replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_") // Replace invalid chars
		.replace(/\s+/g, " ") // Normalize whitespace
		.trim()
		.replace(/[.\s]+$/g, "") // Remove trailing dots
		.slice(0, 180); // Limit length, leaving room for token and extension
	return cleaned.length > 0 ? cleaned : "untitled";
}

/**
 * Build the on-disk name of an item: "<token> - <title>.<format>"
 */
export function buildFilename(position: number, size: number, title: string, format: MediaFormat): string {
	return `${orderingToken(position, size)} - ${sanitizeFilename(title)}.${format}`;
}

/**
 * Whether a collection resize forces every item to be renamed
 */
export function widthChanged(previousSize: number, nextSize: number): boolean {
	return tokenWidth(previousSize) !== tokenWidth(nextSize);
}

export interface LayoutEntry {
	title: string;
	format: MediaFormat;
	/** Name the artifact has on disk right now */
	currentFilename: string;
	/** Position in the previously committed state, null for new items */
	previousPosition: number | null;
}

/**
 * Final file names for a collection laid out in `entries` order.
 * Every name is recomputed when the token width changes; otherwise an item keeps its
 * name unless its position changed or it is new.
 */
export function layoutFilenames(entries: LayoutEntry[], previousSize: number): string[] {
	const size = entries.length;
	const renumberAll = widthChanged(previousSize, size);

	return entries.map((entry, position) => {
		if (!renumberAll && entry.previousPosition === position) {
			return entry.currentFilename;
		}
		return buildFilename(position, size, entry.title, entry.format);
	});
}
