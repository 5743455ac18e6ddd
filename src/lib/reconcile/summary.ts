import { countDiff } from "./diff.js";
import type { Diff, Status, SyncReport, UnitFailure, UnitReport } from "./types.js";

const STATUS_SYMBOLS: Record<Status | "error", string> = {
	new: "+",
	modified: "~",
	unchanged: "=",
	removed: "-",
	error: "!",
};

function plural(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

export function formatFailure(failure: UnitFailure): string {
	const location = failure.relativePath ? ` (${failure.relativePath})` : "";
	return `${failure.unitName}${location} [${failure.stage}] ${failure.message}`;
}

export function formatDiffCounts(diff: Diff): string {
	const counts = countDiff(diff);
	const parts = [
		`${counts.new} new`,
		`${counts.modified} modified`,
		`${counts.unchanged} unchanged`,
		`${counts.removed} removed`,
	];
	if (counts.error > 0) {
		parts.push(plural(counts.error, "error"));
	}
	return parts.join(", ");
}

export function formatDiff(diff: Diff, jsonOutput: boolean): string {
	if (jsonOutput) {
		return JSON.stringify(diff, null, 2);
	}

	const lines: string[] = [];
	for (const unit of diff.units) {
		if (unit.status === "error") {
			lines.push(`${STATUS_SYMBOLS.error} ${formatFailure(unit.error)}`);
			continue;
		}
		lines.push(`${STATUS_SYMBOLS[unit.status]} ${unit.name}`);
		if (unit.status !== "modified") {
			continue;
		}
		for (const file of unit.files) {
			if (file.status !== "unchanged") {
				lines.push(`    ${STATUS_SYMBOLS[file.status]} ${file.relativePath}`);
			}
		}
	}
	if (diff.units.length === 0) {
		lines.push("Nothing to sync.");
	}
	lines.push(`Summary: ${formatDiffCounts(diff)}`);
	return lines.join("\n");
}

function countFileActions(unit: UnitReport): { written: number; skipped: number; failed: number } {
	const counts = { written: 0, skipped: 0, failed: 0 };
	for (const file of unit.files) {
		if (file.action === "written" || file.action === "skipped" || file.action === "failed") {
			counts[file.action] += 1;
		}
	}
	return counts;
}

function formatUnitReport(unit: UnitReport, dryRun: boolean): string | null {
	const counts = countFileActions(unit);
	switch (unit.action) {
		case "applied":
			return `${dryRun ? "Would write" : "Wrote"} ${unit.name} (${plural(counts.written, "file")})`;
		case "partial":
			return (
				`${dryRun ? "Would partially apply" : "Partially applied"} ${unit.name}: ` +
				`${counts.written} written, ${counts.skipped} skipped, ${counts.failed} failed`
			);
		case "skipped":
			return `Skipped ${unit.name}: target differs from source (use --force to overwrite)`;
		case "retained":
			return `Retained ${unit.name}: no longer in source, left in place`;
		case "unchanged":
		case "failed":
			return null;
	}
}

export function formatSyncReport(report: SyncReport, jsonOutput: boolean): string {
	if (jsonOutput) {
		return JSON.stringify(report, null, 2);
	}

	const lines: string[] = [];
	for (const unit of report.units) {
		const line = formatUnitReport(unit, report.dryRun);
		if (line) {
			lines.push(line);
		}
	}
	for (const failure of report.errors) {
		lines.push(`Failed ${formatFailure(failure)}`);
	}

	const { counts } = report;
	const summary =
		`${counts.applied} applied, ${counts.partial} partial, ${counts.skipped} skipped, ` +
		`${counts.unchanged} unchanged, ${counts.retained} retained, ${counts.failed} failed ` +
		`(${plural(counts.filesWritten, "file")} ${report.dryRun ? "to write" : "written"})`;
	lines.push(report.dryRun ? `Dry run: ${summary}` : `Summary: ${summary}`);
	return lines.join("\n");
}

export function reportHasFailures(report: SyncReport): boolean {
	return report.errors.length > 0;
}
