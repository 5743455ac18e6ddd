import path from "node:path";
import { type ContentStore, compareNames } from "../store.js";
import { unitFailure } from "./diff.js";
import { representationFiles } from "./engine.js";
import type {
	Diff,
	FileAction,
	FileReport,
	MaterializedFile,
	Materializer,
	SyncCounts,
	SyncPolicy,
	SyncReport,
	UnitAction,
	UnitDiff,
	UnitFailure,
	UnitReport,
} from "./types.js";

export type ApplyOptions = {
	store: ContentStore;
	materializer: Materializer;
	overwriteModified?: boolean;
};

type UnitContext = {
	options: ApplyOptions;
	dryRun: boolean;
	errors: UnitFailure[];
};

async function writeFile(
	store: ContentStore,
	file: MaterializedFile,
	targetPath: string,
): Promise<void> {
	if (file.origin === "bytes") {
		await store.write(targetPath, file.contents);
		return;
	}
	await store.copy(file.sourcePath, targetPath);
}

function resolveUnitAction(files: FileReport[]): UnitAction {
	let written = 0;
	let skipped = 0;
	let failed = 0;
	for (const file of files) {
		if (file.action === "written") {
			written += 1;
		} else if (file.action === "skipped") {
			skipped += 1;
		} else if (file.action === "failed") {
			failed += 1;
		}
	}
	if (failed > 0) {
		return written > 0 ? "partial" : "failed";
	}
	if (skipped > 0) {
		return written > 0 ? "partial" : "skipped";
	}
	return written > 0 ? "applied" : "unchanged";
}

function plannedAction(status: FileReport["status"], overwrite: boolean): FileAction {
	switch (status) {
		case "new":
			return "written";
		case "modified":
			return overwrite ? "written" : "skipped";
		case "unchanged":
			return "unchanged";
		case "removed":
			return "retained";
	}
}

async function writePlanned(
	context: UnitContext,
	unit: UnitDiff,
	reports: FileReport[],
	materialized: Map<string, MaterializedFile>,
): Promise<void> {
	for (const report of reports) {
		if (report.action !== "written") {
			continue;
		}
		const file = materialized.get(report.relativePath);
		if (!file) {
			report.action = "failed";
			context.errors.push(
				unitFailure(
					unit.name,
					"materialize",
					new Error(`Materialized output no longer contains ${report.relativePath}.`),
					report.relativePath,
				),
			);
			continue;
		}
		if (context.dryRun) {
			continue;
		}
		try {
			await writeFile(context.options.store, file, report.targetPath);
		} catch (error) {
			report.action = "failed";
			context.errors.push(unitFailure(unit.name, "write", error, report.relativePath));
		}
	}
}

async function materializeUnit(
	context: UnitContext,
	unit: UnitDiff,
): Promise<Map<string, MaterializedFile> | null> {
	try {
		if (unit.sourceLocation === null) {
			throw new Error(`Unit ${unit.name} has no source location.`);
		}
		const representation = await context.options.materializer.materialize({
			name: unit.name,
			location: unit.sourceLocation,
		});
		return new Map(representationFiles(representation).map((file) => [file.relativePath, file]));
	} catch (error) {
		const remote = context.options.materializer.kind === "remote-manifest";
		context.errors.push(unitFailure(unit.name, remote ? "fetch" : "materialize", error));
		return null;
	}
}

async function applyUnit(context: UnitContext, unit: UnitDiff, force: boolean): Promise<UnitReport> {
	const { name } = unit;
	if (unit.status === "error") {
		context.errors.push(unit.error);
		return { name, status: "error", action: "failed", files: [] };
	}

	const overwrite = force || (context.options.overwriteModified ?? false);
	const files: FileReport[] = unit.files.map((file) => ({
		relativePath: file.relativePath,
		targetPath: file.targetPath,
		status: file.status,
		action: plannedAction(file.status, overwrite),
	}));

	if (unit.status === "unchanged") {
		return { name, status: unit.status, action: "unchanged", files };
	}
	if (unit.status === "removed") {
		return { name, status: unit.status, action: "retained", files };
	}

	const needsWrite = unit.status === "new" || files.some((file) => file.action === "written");
	if (!needsWrite) {
		return { name, status: unit.status, action: resolveUnitAction(files), files };
	}

	const materialized = await materializeUnit(context, unit);
	if (!materialized) {
		for (const file of files) {
			if (file.action === "written") {
				file.action = "failed";
			}
		}
		return { name, status: unit.status, action: "failed", files };
	}

	if (unit.status === "new") {
		const listed = new Set(files.map((file) => file.relativePath));
		for (const relativePath of materialized.keys()) {
			if (listed.has(relativePath)) {
				continue;
			}
			files.push({
				relativePath,
				targetPath: path.join(unit.targetBase, relativePath),
				status: "new",
				action: "written",
			});
		}
		files.sort((left, right) => compareNames(left.relativePath, right.relativePath));
	}

	await writePlanned(context, unit, files, materialized);
	return { name, status: unit.status, action: resolveUnitAction(files), files };
}

function emptyCounts(): SyncCounts {
	return {
		applied: 0,
		partial: 0,
		skipped: 0,
		unchanged: 0,
		retained: 0,
		failed: 0,
		filesWritten: 0,
	};
}

/**
 * Bring the target in line with a Diff. Unchanged units are not touched, removed files are
 * never deleted, and Modified files are only overwritten under `force` or `overwriteModified`.
 * Every write is independent: a failure is recorded and the remaining files still run.
 * `dryRun` walks the same decisions, including materialization, without writing.
 */
export async function applyDiff(
	diff: Diff,
	policy: SyncPolicy,
	options: ApplyOptions,
): Promise<SyncReport> {
	const dryRun = policy.dryRun ?? false;
	const force = policy.force ?? false;
	const context: UnitContext = { options, dryRun, errors: [] };
	const counts = emptyCounts();
	const units: UnitReport[] = [];

	for (const unit of diff.units) {
		const report = await applyUnit(context, unit, force);
		counts[report.action] += 1;
		counts.filesWritten += report.files.filter((file) => file.action === "written").length;
		units.push(report);
	}

	return {
		kind: diff.kind,
		dryRun,
		force,
		units,
		counts,
		errors: context.errors,
	};
}
