import { z } from "zod";
import dotenv from "dotenv";
import os from "os";
import path from "path";
import { MEDIA_FORMATS } from "../sync/types.js";

dotenv.config();

const configSchema = z.object({
	music: z.object({
		rootPath: z.string().min(1),
		defaultFormat: z.enum(MEDIA_FORMATS).default("mp3"),
	}),
	data: z.object({
		dir: z.string().min(1),
		registryPath: z.string().min(1),
		failureLogPath: z.string().min(1),
	}),
	sync: z.object({
		concurrency: z.number().int().min(1).max(16).default(1),
		itemTimeoutSeconds: z.number().int().min(0).default(600),
		allowEmptyRemote: z.boolean().default(false),
	}),
	quality: z.object({
		maxHeight: z.number().int().positive().default(1080),
		audioQuality: z.number().int().min(0).max(10).default(0),
	}),
	ytdlp: z.object({
		path: z.string().default("yt-dlp"),
	}),
});

type Config = z.infer<typeof configSchema>;

/**
 * Default application data directory (XDG on Linux, platform conventions elsewhere)
 */
export function defaultDataDir(env: NodeJS.ProcessEnv = process.env): string {
	if (env.XDG_DATA_HOME) {
		return path.join(env.XDG_DATA_HOME, "plsync");
	}
	if (process.platform === "win32" && env.APPDATA) {
		return path.join(env.APPDATA, "plsync");
	}
	if (process.platform === "darwin") {
		return path.join(os.homedir(), "Library", "Application Support", "plsync");
	}
	return path.join(os.homedir(), ".local", "share", "plsync");
}

function expandHome(value: string): string {
	return value === "~" || value.startsWith("~/") ? path.join(os.homedir(), value.slice(1)) : value;
}

function parseInteger(value: string | undefined, fallback: number): number {
	if (value === undefined || value.trim() === "") {
		return fallback;
	}
	const parsed = parseInt(value, 10);
	return isNaN(parsed) ? fallback : parsed;
}

/**
 * Build the runtime configuration from the environment.
 * Read on every call so tests and the CLI can change variables between calls.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const dataDir = expandHome(env.PLSYNC_DATA_DIR || defaultDataDir(env));

	const rawConfig = {
		music: {
			rootPath: expandHome(env.MUSIC_ROOT_PATH || "./music"),
			defaultFormat: (env.PLSYNC_FORMAT || "mp3").toLowerCase(),
		},
		data: {
			dir: dataDir,
			registryPath: path.join(dataDir, "registry.json"),
			failureLogPath: path.join(dataDir, "sync-errors.json"),
		},
		sync: {
			concurrency: parseInteger(env.SYNC_CONCURRENCY, 1),
			itemTimeoutSeconds: parseInteger(env.PLSYNC_ITEM_TIMEOUT, 600),
			allowEmptyRemote: env.PLSYNC_ALLOW_EMPTY === "true",
		},
		quality: {
			maxHeight: parseInteger(env.PLSYNC_MAX_HEIGHT, 1080),
			audioQuality: parseInteger(env.PLSYNC_AUDIO_QUALITY, 0),
		},
		ytdlp: {
			path: env.YTDLP_PATH || "yt-dlp",
		},
	};

	return configSchema.parse(rawConfig);
}

export type { Config };
