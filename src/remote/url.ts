export const PLAYLIST_URL_PREFIX = "https://www.youtube.com/playlist?list=";
export const VIDEO_URL_PREFIX = "https://www.youtube.com/watch?v=";
export const SHORT_VIDEO_URL_PREFIX = "https://youtu.be/";

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Extract the playlist id from a playlist URL (any URL carrying a `list=` parameter)
 * or accept a bare playlist id
 */
export function extractPlaylistId(input: string): string | null {
	const value = input.trim();

	if (!value.includes("://")) {
		return ID_PATTERN.test(value) && value.length >= 10 ? value : null;
	}

	if (!value.startsWith("https://") || !value.includes("list=")) {
		return null;
	}

	const id = value.split("list=")[1]?.split("&")[0]?.split("#")[0] ?? "";
	return ID_PATTERN.test(id) ? id : null;
}

/**
 * Rebuild a playlist URL in its canonical form, or null if it is not a playlist URL
 */
export function normalizePlaylistUrl(input: string): string | null {
	const id = extractPlaylistId(input);
	return id ? PLAYLIST_URL_PREFIX + id : null;
}

/**
 * Canonical watch URL for `watch?v=` and `youtu.be/` links. Playlist links are rejected.
 */
export function normalizeVideoUrl(input: string): string | null {
	const value = input.trim();
	let id: string | undefined;

	if (value.startsWith("https://") && value.includes("watch?v=") && !value.includes("list=")) {
		id = value.split("watch?v=")[1]?.split("&")[0];
	} else if (value.startsWith(SHORT_VIDEO_URL_PREFIX)) {
		id = value.slice(SHORT_VIDEO_URL_PREFIX.length).split("?")[0];
	}

	return id && ID_PATTERN.test(id) ? VIDEO_URL_PREFIX + id : null;
}

export function playlistUrl(collectionId: string): string {
	return PLAYLIST_URL_PREFIX + collectionId;
}

export function videoUrl(itemId: string): string {
	return VIDEO_URL_PREFIX + itemId;
}
