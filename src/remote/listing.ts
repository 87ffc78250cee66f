import { z } from "zod";
import type { RemoteCollection, RemoteItem } from "../sync/types.js";

/** Placeholder titles yt-dlp reports for entries that can no longer be played. */
const UNAVAILABLE_TITLES = new Set(["[Deleted video]", "[Private video]", "[Unavailable video]"]);

/** Availability values of entries that cannot be fetched anonymously. */
const RESTRICTED_AVAILABILITY = new Set(["private", "premium_only", "subscriber_only", "needs_auth"]);

const entrySchema = z.object({
	id: z.string().min(1),
	title: z.string().nullish(),
	availability: z.string().nullish(),
});

const playlistSchema = z.object({
	id: z.string().nullish(),
	title: z.string().nullish(),
	entries: z.array(z.unknown()).default([]),
});

export interface ParsedListing {
	collection: RemoteCollection;
	/** Entries dropped because they are unavailable */
	unavailable: number;
	/** Entries dropped because they are malformed */
	malformed: number;
	/** Repeated ids dropped after their first occurrence */
	duplicates: number;
}

/**
 * Turn the JSON yt-dlp prints for a flat playlist into a validated listing
 */
export function parseListing(collectionId: string, raw: unknown): ParsedListing {
	const playlist = playlistSchema.parse(raw);
	const items: RemoteItem[] = [];
	const seen = new Set<string>();
	let unavailable = 0;
	let malformed = 0;
	let duplicates = 0;

	for (const rawEntry of playlist.entries) {
		if (rawEntry === null) {
			unavailable++;
			continue;
		}

		const parsed = entrySchema.safeParse(rawEntry);
		if (!parsed.success) {
			malformed++;
			continue;
		}

		const entry = parsed.data;
		const title = entry.title?.trim() ?? "";
		if (UNAVAILABLE_TITLES.has(title) || (entry.availability && RESTRICTED_AVAILABILITY.has(entry.availability))) {
			unavailable++;
			continue;
		}

		if (seen.has(entry.id)) {
			duplicates++;
			continue;
		}
		seen.add(entry.id);

		items.push({ itemId: entry.id, displayTitle: title || entry.id });
	}

	return {
		collection: {
			id: playlist.id || collectionId,
			title: playlist.title?.trim() || "Unknown Playlist",
			items,
		},
		unavailable,
		malformed,
		duplicates,
	};
}
