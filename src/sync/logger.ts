import fs from "fs";
import path from "path";
import pc from "picocolors";
import { z } from "zod";
import type { Plan, UpdateReport } from "./types.js";

export interface SyncLogger {
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

export const consoleLogger: SyncLogger = {
	info: (message) => console.log(message),
	warn: (message) => console.log(pc.yellow(message)),
	error: (message) => console.error(pc.red(message)),
};

export const silentLogger: SyncLogger = {
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};

const failureLogEntrySchema = z.object({
	timestamp: z.string(),
	playlist: z.string(),
	collectionId: z.string().optional(),
	itemId: z.string().optional(),
	itemTitle: z.string().optional(),
	error: z.string(),
	type: z.enum(["listing", "item_download", "update_aborted", "restore"]),
});

export type FailureLogEntry = z.infer<typeof failureLogEntrySchema>;

const MAX_FAILURE_LOG_ENTRIES = 1000;

/**
 * Load failure log from file
 */
export function loadFailureLog(logPath: string): FailureLogEntry[] {
	if (!fs.existsSync(logPath)) {
		return [];
	}

	try {
		const content = fs.readFileSync(logPath, "utf-8");
		const parsed = z.array(failureLogEntrySchema).safeParse(JSON.parse(content));
		return parsed.success ? parsed.data : [];
	} catch {
		return [];
	}
}

/**
 * Append failure entries to the log, keeping the most recent ones
 */
export function writeFailureLog(logPath: string, entries: Array<Omit<FailureLogEntry, "timestamp">>): void {
	if (entries.length === 0) {
		return;
	}

	const dir = path.dirname(logPath);
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}

	const timestamp = new Date().toISOString();
	const existing = loadFailureLog(logPath);
	existing.push(...entries.map((entry) => ({ ...entry, timestamp })));

	try {
		fs.writeFileSync(logPath, JSON.stringify(existing.slice(-MAX_FAILURE_LOG_ENTRIES), null, 2), "utf-8");
	} catch (error) {
		console.error(`Error writing failure log: ${error}`);
	}
}

/**
 * Clear failure log
 */
export function clearFailureLog(logPath: string): void {
	if (fs.existsSync(logPath)) {
		fs.unlinkSync(logPath);
	}
}

/**
 * Failure log entries describing one update report
 */
export function failureEntriesFor(report: UpdateReport): Array<Omit<FailureLogEntry, "timestamp">> {
	const entries: Array<Omit<FailureLogEntry, "timestamp">> = report.failed.map((failure) => ({
		playlist: report.title,
		collectionId: report.collectionId,
		itemId: failure.itemId,
		itemTitle: failure.displayTitle,
		error: `[${failure.reason}] ${failure.error}`,
		type: "item_download",
	}));

	if (report.status === "aborted") {
		entries.push({
			playlist: report.title,
			collectionId: report.collectionId,
			error: report.error ?? "update aborted",
			type: "update_aborted",
		});
	}

	return entries;
}

export function logSyncStart(options: { musicRootPath: string; playlists: number; mode: "download" | "sync" }): void {
	console.log();
	console.log("═══════════════════════════════════════════════════════════");
	console.log(`  ${options.mode === "download" ? "Starting Playlist Download" : "Starting Playlist Sync"}`);
	console.log("═══════════════════════════════════════════════════════════");
	console.log(`  Music Root: ${options.musicRootPath}`);
	console.log(`  Playlists: ${options.playlists}`);
	console.log("═══════════════════════════════════════════════════════════");
	console.log();
}

/**
 * One-line summary of a computed plan
 */
export function describePlan(plan: Plan): string {
	const parts = [
		`${plan.additions.length} to add`,
		`${plan.removals.length} to remove`,
		`${plan.moves.length} to move`,
		`${plan.unchanged.length} unchanged`,
	];
	return parts.join(", ");
}

export function logPlan(title: string, plan: Plan): void {
	console.log(`  ${pc.bold(title)}: ${pc.dim(describePlan(plan))}`);
	for (const removal of plan.removals) {
		console.log(pc.red(`    - ${removal.record.displayTitle}`));
	}
	for (const move of plan.moves) {
		console.log(pc.blue(`    ↕ ${move.record.displayTitle} (${move.from + 1} → ${move.to + 1})`));
	}
	for (const addition of plan.additions) {
		console.log(pc.green(`    + ${addition.item.displayTitle} (${addition.position + 1})`));
	}
}

/**
 * Log the outcome of one playlist update
 */
export function logReport(report: UpdateReport): void {
	const seconds = (report.durationMs / 1000).toFixed(1);

	if (report.status === "aborted") {
		console.log(pc.red(`  ✗ ${report.title} - update aborted: ${report.error ?? "unknown error"}`));
		if (report.landed.length > 0) {
			console.log(pc.dim(`    ${report.landed.length} downloaded file(s) kept; they will be reconciled next run`));
		}
	} else {
		const changes = `${report.added.length} added, ${report.removed.length} removed, ${report.moved.length} moved`;
		console.log(pc.green(`  ✓ ${report.title} - ${changes} (${seconds}s)`));
		if (report.discarded.length > 0) {
			console.log(pc.dim(`    ${report.discarded.length} leftover file(s) from an unfinished update removed`));
		}
	}

	for (const failure of report.failed) {
		console.log(pc.red(`    ✗ ${failure.displayTitle}: `) + pc.dim(`[${failure.reason}] ${failure.error}`));
	}
}

export interface RunSummary {
	playlists: number;
	committed: number;
	aborted: number;
	added: number;
	removed: number;
	moved: number;
	failed: number;
	duration: number; // milliseconds
}

export function summarizeReports(reports: UpdateReport[], duration: number): RunSummary {
	return {
		playlists: reports.length,
		committed: reports.filter((report) => report.status === "committed").length,
		aborted: reports.filter((report) => report.status === "aborted").length,
		added: reports.reduce((sum, report) => sum + report.added.length, 0),
		removed: reports.reduce((sum, report) => sum + report.removed.length, 0),
		moved: reports.reduce((sum, report) => sum + report.moved.length, 0),
		failed: reports.reduce((sum, report) => sum + report.failed.length, 0),
		duration,
	};
}

/**
 * Log run complete with summary
 */
export function logSyncComplete(summary: RunSummary): void {
	const durationSeconds = (summary.duration / 1000).toFixed(1);

	console.log();
	console.log("═══════════════════════════════════════════════════════════");
	console.log("  Sync Complete");
	console.log("═══════════════════════════════════════════════════════════");
	console.log(`  Playlists: ${summary.committed}/${summary.playlists} updated`);
	if (summary.aborted > 0) {
		console.log(`  Aborted: ${summary.aborted}`);
	}
	console.log(`  Added: ${summary.added}`);
	console.log(`  Removed: ${summary.removed}`);
	console.log(`  Moved: ${summary.moved}`);
	if (summary.failed > 0) {
		console.log(`  Failed: ${summary.failed}`);
	}
	console.log(`  Duration: ${durationSeconds}s`);
	console.log("═══════════════════════════════════════════════════════════");
	console.log();
}
