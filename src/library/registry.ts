import fs from "fs";
import path from "path";
import { z } from "zod";
import { extractPlaylistId, normalizePlaylistUrl } from "../remote/url.js";
import { sanitizeFilename } from "../sync/naming.js";

/** Playlist title → canonical playlist URL */
const registrySchema = z.record(z.string(), z.string());

export type Registry = z.infer<typeof registrySchema>;

export type UrlCheck = "invalid" | "exists" | "new";

export interface RegisteredPlaylist {
	title: string;
	url: string;
	collectionId: string;
	/** Directory of the playlist under the music root */
	directory: string;
}

/**
 * Load the registry; a missing or unreadable file is an empty registry
 */
export function loadRegistry(registryPath: string): Registry {
	if (!fs.existsSync(registryPath)) {
		return {};
	}

	try {
		const parsed = registrySchema.safeParse(JSON.parse(fs.readFileSync(registryPath, "utf-8")));
		return parsed.success ? parsed.data : {};
	} catch {
		return {};
	}
}

export function saveRegistry(registryPath: string, registry: Registry): void {
	fs.mkdirSync(path.dirname(registryPath), { recursive: true });
	const tempPath = `${registryPath}.tmp`;
	fs.writeFileSync(tempPath, JSON.stringify(registry, null, 4), "utf-8");
	fs.renameSync(tempPath, registryPath);
}

/**
 * Classify a playlist URL against the registry
 */
export function checkPlaylistUrl(registry: Registry, url: string): UrlCheck {
	const canonical = normalizePlaylistUrl(url);
	if (!canonical) {
		return "invalid";
	}
	return Object.values(registry).includes(canonical) ? "exists" : "new";
}

/**
 * Add a playlist under its title. Re-registering the same URL under a new title moves it.
 */
export function registerPlaylist(registryPath: string, title: string, url: string): string {
	const canonical = normalizePlaylistUrl(url);
	if (!canonical) {
		throw new Error(`Not a playlist URL: ${url}`);
	}

	const registry = loadRegistry(registryPath);
	for (const [existingTitle, existingUrl] of Object.entries(registry)) {
		if (existingUrl === canonical) {
			delete registry[existingTitle];
		}
	}
	registry[title] = canonical;
	saveRegistry(registryPath, registry);
	return canonical;
}

/**
 * Remove a playlist by title or URL. Returns whether anything was removed.
 */
export function unregisterPlaylist(registryPath: string, titleOrUrl: string): boolean {
	const registry = loadRegistry(registryPath);
	const canonical = normalizePlaylistUrl(titleOrUrl);
	let removed = false;

	for (const [title, url] of Object.entries(registry)) {
		if (title === titleOrUrl || (canonical !== null && url === canonical)) {
			delete registry[title];
			removed = true;
		}
	}

	if (removed) {
		saveRegistry(registryPath, registry);
	}
	return removed;
}

/**
 * Directory a playlist is mirrored into
 */
export function playlistDirectory(musicRootPath: string, title: string): string {
	return path.join(musicRootPath, sanitizeFilename(title));
}

/**
 * Registered playlists sorted by title. Entries whose URL no longer parses are skipped.
 */
export function listPlaylists(registryPath: string, musicRootPath: string): RegisteredPlaylist[] {
	const registry = loadRegistry(registryPath);
	const playlists: RegisteredPlaylist[] = [];

	for (const [title, url] of Object.entries(registry)) {
		const collectionId = extractPlaylistId(url);
		if (!collectionId) continue;
		playlists.push({ title, url, collectionId, directory: playlistDirectory(musicRootPath, title) });
	}

	return playlists.sort((a, b) => a.title.localeCompare(b.title));
}

/**
 * Delete the application data directory. Downloaded media is not touched.
 */
export function deleteAppData(dataDir: string): boolean {
	if (!fs.existsSync(dataDir)) {
		return false;
	}
	fs.rmSync(dataDir, { recursive: true, force: true });
	return true;
}
