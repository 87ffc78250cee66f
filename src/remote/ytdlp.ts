import { spawn } from "child_process";
import { RemoteUnavailableError, errorMessage } from "../errors.js";
import type { RemoteCollection } from "../sync/types.js";
import { parseListing, type ParsedListing } from "./listing.js";
import type { RemoteEnumerator } from "./types.js";
import { playlistUrl } from "./url.js";
import type { SyncLogger } from "../sync/logger.js";

export interface YtDlpOptions {
	/** Path of the yt-dlp executable */
	binary?: string;
	logger?: SyncLogger;
}

export interface YtDlpOutput {
	code: number | null;
	stdout: string;
	stderr: string;
}

/**
 * Run yt-dlp and collect its output. Rejects only when the process cannot be started
 * or is aborted; a non-zero exit code is left to the caller.
 */
export function runYtDlp(binary: string, args: string[], signal?: AbortSignal): Promise<YtDlpOutput> {
	return new Promise((resolve, reject) => {
		const proc = spawn(binary, args, {
			stdio: ["ignore", "pipe", "pipe"],
			signal,
		});

		let stdout = "";
		let stderr = "";

		proc.stdout.on("data", (data: Buffer) => {
			stdout += data.toString();
		});

		proc.stderr.on("data", (data: Buffer) => {
			stderr += data.toString();
		});

		proc.on("close", (code) => {
			resolve({ code, stdout, stderr });
		});

		proc.on("error", (error) => {
			if (error.name === "AbortError") {
				reject(error);
				return;
			}
			reject(new Error(`Failed to run ${binary}: ${error.message}`));
		});
	});
}

/**
 * Last meaningful line yt-dlp wrote to stderr, usually "ERROR: ..."
 */
export function lastErrorLine(stderr: string): string {
	const lines = stderr
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
	const errorLine = [...lines].reverse().find((line) => line.startsWith("ERROR:"));
	return (errorLine ?? lines[lines.length - 1] ?? "no output").replace(/^ERROR:\s*/, "");
}

/**
 * Lists playlists with `yt-dlp --flat-playlist`, without downloading anything
 */
export class YtDlpEnumerator implements RemoteEnumerator {
	private binary: string;
	private logger?: SyncLogger;

	constructor(options: YtDlpOptions = {}) {
		this.binary = options.binary ?? "yt-dlp";
		this.logger = options.logger;
	}

	async listCollection(collectionId: string, signal?: AbortSignal): Promise<RemoteCollection> {
		let output: YtDlpOutput;
		try {
			output = await runYtDlp(
				this.binary,
				["--flat-playlist", "--dump-single-json", "--ignore-errors", "--no-warnings", playlistUrl(collectionId)],
				signal
			);
		} catch (error) {
			throw new RemoteUnavailableError(collectionId, errorMessage(error), { cause: error });
		}

		if (output.code !== 0 && output.stdout.trim().length === 0) {
			throw new RemoteUnavailableError(collectionId, lastErrorLine(output.stderr));
		}

		let raw: unknown;
		try {
			raw = JSON.parse(output.stdout);
		} catch (error) {
			throw new RemoteUnavailableError(collectionId, "listing is not valid JSON", { cause: error });
		}

		let parsed: ParsedListing;
		try {
			parsed = parseListing(collectionId, raw);
		} catch (error) {
			throw new RemoteUnavailableError(collectionId, "unexpected listing format", { cause: error });
		}

		const dropped = parsed.unavailable + parsed.malformed + parsed.duplicates;
		if (dropped > 0) {
			this.logger?.info(
				`  ${parsed.collection.title}: skipped ${parsed.unavailable} unavailable, ` +
					`${parsed.malformed} malformed and ${parsed.duplicates} repeated entries`
			);
		}

		return parsed.collection;
	}
}
