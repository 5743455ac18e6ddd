import { classifyError, describeError, type SyncStage } from "../errors.js";
import { compareNames } from "../store.js";
import type { Diff, FileDiff, Status, UnitDiff, UnitFailure } from "./types.js";

export type DiffCounts = Record<Status | "error", number>;

export function unitFailure(
	unitName: string,
	stage: SyncStage,
	error: unknown,
	relativePath: string | null = null,
): UnitFailure {
	return {
		unitName,
		stage,
		kind: classifyError(error),
		message: describeError(error),
		relativePath,
	};
}

/**
 * `unchanged` only when every file is unchanged, which holds vacuously for an empty set.
 */
export function aggregateStatus(files: readonly FileDiff[]): Status {
	return files.every((file) => file.status === "unchanged") ? "unchanged" : "modified";
}

export function sortFiles(files: FileDiff[]): FileDiff[] {
	return files.sort((left, right) => compareNames(left.relativePath, right.relativePath));
}

export function buildDiff(
	kind: string,
	sourceRoot: string,
	targetRoot: string,
	units: UnitDiff[],
): Diff {
	const sorted = [...units].sort((left, right) => compareNames(left.name, right.name));
	for (const unit of sorted) {
		for (const file of unit.files) {
			Object.freeze(file);
		}
		Object.freeze(unit.files);
		if (unit.status === "error") {
			Object.freeze(unit.error);
		}
		Object.freeze(unit);
	}
	return Object.freeze({
		kind,
		sourceRoot,
		targetRoot,
		units: Object.freeze(sorted),
	});
}

export function countDiff(diff: Diff): DiffCounts {
	const counts: DiffCounts = { new: 0, modified: 0, unchanged: 0, removed: 0, error: 0 };
	for (const unit of diff.units) {
		counts[unit.status] += 1;
	}
	return counts;
}

export function hasChanges(diff: Diff): boolean {
	return diff.units.some((unit) => unit.status !== "unchanged");
}

export function findUnit(diff: Diff, name: string): UnitDiff | null {
	return diff.units.find((unit) => unit.name === name) ?? null;
}

export function diffFailures(diff: Diff): UnitFailure[] {
	const failures: UnitFailure[] = [];
	for (const unit of diff.units) {
		if (unit.status === "error") {
			failures.push(unit.error);
		}
	}
	return failures;
}
