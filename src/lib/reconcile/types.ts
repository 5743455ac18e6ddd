import type { UnitPredicate } from "../discovery.js";
import type { ErrorKind, SyncStage } from "../errors.js";
import type { Fingerprint } from "../fingerprint.js";

export type Status = "new" | "modified" | "unchanged" | "removed";

export type SourceUnit = {
	name: string;
	location: string;
};

export type MaterializedFile =
	| { relativePath: string; origin: "bytes"; contents: Buffer }
	| { relativePath: string; origin: "copy"; sourcePath: string };

export type TargetRepresentation =
	| { kind: "file"; file: MaterializedFile }
	| { kind: "files"; files: MaterializedFile[] };

type MaterializeFn = (unit: SourceUnit) => Promise<TargetRepresentation>;

/**
 * Deterministic source-to-target transformation. The variant tag only names the strategy;
 * callers always go through `materialize`.
 */
export type Materializer =
	| { kind: "compiling"; materialize: MaterializeFn }
	| { kind: "verbatim"; materialize: MaterializeFn }
	| { kind: "remote-manifest"; materialize: MaterializeFn };

export type ContentKind = {
	id: string;
	source: UnitPredicate;
	target: UnitPredicate;
	materializer: Materializer;
};

export type UnitFailure = {
	unitName: string;
	stage: SyncStage;
	kind: ErrorKind;
	message: string;
	relativePath: string | null;
};

export type FileDiff = {
	relativePath: string;
	targetPath: string;
	status: Status;
	expectedFingerprint: Fingerprint | null;
	actualFingerprint: Fingerprint | null;
};

type UnitDiffBase = {
	name: string;
	sourceLocation: string | null;
	/** Directory that `files[].relativePath` resolves against. */
	targetBase: string;
	files: readonly FileDiff[];
};

export type UnitDiff =
	| (UnitDiffBase & { status: Status })
	| (UnitDiffBase & { status: "error"; error: UnitFailure });

export type Diff = {
	kind: string;
	sourceRoot: string;
	targetRoot: string;
	units: readonly UnitDiff[];
};

export type SyncPolicy = {
	dryRun?: boolean;
	force?: boolean;
};

export type FileAction = "written" | "skipped" | "unchanged" | "retained" | "failed";

export type UnitAction = "applied" | "partial" | "skipped" | "unchanged" | "retained" | "failed";

export type FileReport = {
	relativePath: string;
	targetPath: string;
	status: Status;
	action: FileAction;
};

export type UnitReport = {
	name: string;
	status: Status | "error";
	action: UnitAction;
	files: FileReport[];
};

export type SyncCounts = Record<UnitAction, number> & {
	filesWritten: number;
};

export type SyncReport = {
	kind: string;
	dryRun: boolean;
	force: boolean;
	units: UnitReport[];
	counts: SyncCounts;
	errors: UnitFailure[];
};
