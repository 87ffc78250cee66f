import { describe, test, expect } from "vitest";
import { AgeRestrictedError, ItemUnavailableError, RetrievalFailedError } from "../errors.js";
import { buildFormatArgs, classifyYtDlpError } from "./downloader.js";
import { buildTags } from "./tagger.js";
import { isVideoFormat, thumbnailUrl } from "./types.js";

describe("buildFormatArgs", () => {
	test("audio formats extract audio at the requested quality", () => {
		expect(buildFormatArgs("mp3", { maxHeight: 1080, audioQuality: 2 })).toEqual([
			"-f",
			"bestaudio/best",
			"-x",
			"--audio-format",
			"mp3",
			"--audio-quality",
			"2",
		]);
	});

	test("video formats cap the height and merge into the container", () => {
		expect(buildFormatArgs("mkv", { maxHeight: 720, audioQuality: 0 })).toEqual([
			"-f",
			"bestvideo[height<=720]+bestaudio/best[height<=720]/best",
			"--merge-output-format",
			"mkv",
			"--remux-video",
			"mkv",
		]);
	});

	test("isVideoFormat separates containers from audio", () => {
		expect(isVideoFormat("mp4")).toBe(true);
		expect(isVideoFormat("opus")).toBe(false);
	});
});

describe("classifyYtDlpError", () => {
	test("age gates are permanent", () => {
		const error = classifyYtDlpError("abc", "ERROR: [youtube] abc: Sign in to confirm your age.");
		expect(error).toBeInstanceOf(AgeRestrictedError);
	});

	test("removed and private videos are unavailable", () => {
		const error = classifyYtDlpError("abc", "ERROR: [youtube] abc: Private video. Sign in if you've been granted access");
		expect(error).toBeInstanceOf(ItemUnavailableError);
		expect(error.message).toBe("Item abc is [youtube] abc: Private video. Sign in if you've been granted access");
	});

	test("anything else is a retrieval failure", () => {
		const error = classifyYtDlpError("abc", "ERROR: unable to download video data: HTTP Error 403: Forbidden");
		expect(error).toBeInstanceOf(RetrievalFailedError);
		expect(error.message).toBe("Retrieval of abc failed: unable to download video data: HTTP Error 403: Forbidden");
	});
});

describe("buildTags", () => {
	test("fills title, artist, album, track and year", () => {
		const tags = buildTags({
			title: "First",
			artist: "Channel",
			album: "Road Trip",
			trackNumber: 3,
			totalTracks: 12,
			uploadDate: "20240115",
		});

		expect(tags).toEqual({
			title: "First",
			artist: "Channel",
			album: "Road Trip",
			trackNumber: "3/12",
			year: "2024",
		});
	});

	test("embeds the cover when one was fetched", () => {
		const cover = Buffer.from("jpeg");
		const tags = buildTags({ title: "First" }, cover);
		expect(tags.image).toEqual({
			mime: "image/jpeg",
			type: { id: 3, name: "front cover" },
			description: "Cover",
			imageBuffer: cover,
		});
	});

	test("disabled fields are left out", () => {
		const tags = buildTags({ title: "First", artist: "Channel" }, undefined, { title: true });
		expect(tags).toEqual({ title: "First" });
	});

	test("thumbnailUrl points at the video still", () => {
		expect(thumbnailUrl("abc")).toBe("https://i.ytimg.com/vi/abc/hqdefault.jpg");
	});
});
