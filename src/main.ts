#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { downloadCommand } from "./cli/download.js";
import {
	addPlaylistCommand,
	listPlaylistsCommand,
	recoverCommand,
	removePlaylistCommand,
	resetCommand,
	videoCommand,
} from "./cli/manage.js";
import { syncCommand } from "./cli/sync.js";

const program = new Command();

function run(task: () => number | Promise<number>) {
	Promise.resolve()
		.then(task)
		.then((code) => process.exit(code))
		.catch((e: unknown) => {
			console.error(pc.red("Error:"), e instanceof Error ? e.message : String(e));
			process.exit(1);
		});
}

program
	.name("plsync")
	.description("Mirror YouTube playlists into local folders, kept in playlist order")
	.version("1.0.0");

program
	.command("download")
	.alias("d")
	.description("Download new playlists into the music root and register them")
	.argument("<playlist...>", "Playlist URLs or ids")
	.option("-f, --format <format>", "Output format: mp3, m4a, flac, opus, wav, mp4, mkv, webm")
	.option("--dry-run", "Preview what would be downloaded without actually downloading")
	.action((playlists: string[], opts: { format?: string; dryRun?: boolean }) => {
		run(() => downloadCommand(playlists, opts));
	});

program
	.command("sync")
	.alias("s")
	.description("Bring downloaded playlists in line with their remote order")
	.argument("[playlist...]", "Registered playlist titles or URLs (all when omitted)")
	.option("--allow-empty", "Allow an empty remote playlist to delete every local item")
	.option("--dry-run", "Show the changes without applying them")
	.option("-c, --concurrency <n>", "Parallel downloads per playlist")
	.action((playlists: string[], opts: { allowEmpty?: boolean; dryRun?: boolean; concurrency?: string }) => {
		run(() => syncCommand(playlists, opts));
	});

program
	.command("video")
	.alias("v")
	.description("Download single videos into the music root")
	.argument("<url...>", "Video URLs")
	.option("-f, --format <format>", "Output format: mp3, m4a, flac, opus, wav, mp4, mkv, webm")
	.action((urls: string[], opts: { format?: string }) => {
		run(() => videoCommand(urls, opts));
	});

program
	.command("recover")
	.description("Restore a playlist directory left behind by an interrupted update")
	.argument("<directory>", "Playlist directory")
	.action((directory: string) => {
		run(() => recoverCommand(directory));
	});

const playlists = program.command("playlists").description("Manage registered playlists");

playlists
	.command("list")
	.alias("ls")
	.description("List registered playlists")
	.action(() => {
		run(() => listPlaylistsCommand());
	});

playlists
	.command("add")
	.description("Register a playlist under a title")
	.argument("<title>", "Playlist title (also its folder name)")
	.argument("<url>", "Playlist URL")
	.action((title: string, url: string) => {
		run(() => addPlaylistCommand(title, url));
	});

playlists
	.command("remove")
	.alias("rm")
	.description("Unregister a playlist; downloaded files are kept")
	.argument("<playlist>", "Playlist title or URL")
	.action((playlist: string) => {
		run(() => removePlaylistCommand(playlist));
	});

program
	.command("reset")
	.description("Delete application data (registry and failure log)")
	.option("--yes", "Confirm deletion")
	.action((opts: { yes?: boolean }) => {
		run(() => resetCommand(opts));
	});

program.parse();
