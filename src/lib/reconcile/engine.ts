import path from "node:path";
import { type DiscoveredUnit, discoverUnits } from "../discovery.js";
import type { SyncStage } from "../errors.js";
import { type Fingerprint, fingerprint, fingerprintFile } from "../fingerprint.js";
import { type CollectedFile, type ContentStore, collectFiles, compareNames } from "../store.js";
import { aggregateStatus, buildDiff, sortFiles, unitFailure } from "./diff.js";
import type {
	ContentKind,
	Diff,
	FileDiff,
	MaterializedFile,
	TargetRepresentation,
	UnitDiff,
} from "./types.js";

export type ReconcileOptions = {
	store: ContentStore;
	sourceRoot: string;
	targetRoot: string;
	kind: ContentKind;
};

export function representationFiles(representation: TargetRepresentation): MaterializedFile[] {
	return representation.kind === "file" ? [representation.file] : representation.files;
}

export async function fingerprintMaterialized(
	store: ContentStore,
	file: MaterializedFile,
): Promise<Fingerprint> {
	if (file.origin === "bytes") {
		return fingerprint(file.contents);
	}
	return await fingerprintFile(store, file.sourcePath);
}

/**
 * Directory the unit's files live under on the target side. Single-file units sit directly in
 * the target root; directory units get their own folder.
 */
export function resolveTargetBase(kind: ContentKind, targetRoot: string, name: string): string {
	return kind.target.type === "marker" ? path.join(targetRoot, name) : targetRoot;
}

async function listTargetFiles(
	store: ContentStore,
	kind: ContentKind,
	targetBase: string,
	target: DiscoveredUnit | undefined,
): Promise<CollectedFile[]> {
	if (kind.target.type === "marker") {
		return await collectFiles(store, targetBase);
	}
	if (!target) {
		return [];
	}
	return [{ relativePath: path.basename(target.location), path: target.location }];
}

async function reconcileUnit(
	options: ReconcileOptions,
	name: string,
	source: DiscoveredUnit | undefined,
	target: DiscoveredUnit | undefined,
): Promise<UnitDiff> {
	const { store, kind } = options;
	const targetBase = resolveTargetBase(kind, options.targetRoot, name);
	const base = { name, sourceLocation: source?.location ?? null, targetBase };

	let stage: SyncStage = "discover";
	let currentPath: string | null = null;
	try {
		// Files in a target folder that lacks the marker are compared like any other target.
		const existing = await listTargetFiles(store, kind, targetBase, target);
		if (source && !target && existing.length === 0) {
			return { ...base, status: "new", files: [] };
		}
		if (!source) {
			const files = existing.map(
				(file): FileDiff => ({
					relativePath: file.relativePath,
					targetPath: file.path,
					status: "removed",
					expectedFingerprint: null,
					actualFingerprint: null,
				}),
			);
			return { ...base, status: "removed", files };
		}

		stage = "materialize";
		const representation = await kind.materializer.materialize(source);
		const expected = representationFiles(representation);

		stage = "fingerprint";
		const existingByPath = new Map(existing.map((file) => [file.relativePath, file.path]));
		const files: FileDiff[] = [];
		for (const file of expected) {
			currentPath = file.relativePath;
			const targetPath = path.join(targetBase, file.relativePath);
			const expectedFingerprint = await fingerprintMaterialized(store, file);
			const existingPath = existingByPath.get(file.relativePath);
			if (existingPath === undefined) {
				files.push({
					relativePath: file.relativePath,
					targetPath,
					status: "new",
					expectedFingerprint,
					actualFingerprint: null,
				});
				continue;
			}
			existingByPath.delete(file.relativePath);
			const actualFingerprint = await fingerprintFile(store, existingPath);
			files.push({
				relativePath: file.relativePath,
				targetPath,
				status: expectedFingerprint === actualFingerprint ? "unchanged" : "modified",
				expectedFingerprint,
				actualFingerprint,
			});
		}
		currentPath = null;

		for (const [relativePath, targetPath] of existingByPath) {
			files.push({
				relativePath,
				targetPath,
				status: "removed",
				expectedFingerprint: null,
				actualFingerprint: null,
			});
		}

		sortFiles(files);
		return { ...base, status: aggregateStatus(files), files };
	} catch (error) {
		return {
			...base,
			status: "error",
			files: [],
			error: unitFailure(name, stage, error, currentPath),
		};
	}
}

/**
 * Compare every source unit against the target tree and classify it. Units are processed
 * concurrently; a failing unit is reported with its error and the rest still resolve.
 * Failure to list either root rejects the whole pass.
 */
export async function reconcile(options: ReconcileOptions): Promise<Diff> {
	const { store, kind } = options;
	const [sources, targets] = await Promise.all([
		discoverUnits(store, options.sourceRoot, kind.source),
		discoverUnits(store, options.targetRoot, kind.target),
	]);

	const sourceByName = new Map(sources.map((unit) => [unit.name, unit]));
	const targetByName = new Map(targets.map((unit) => [unit.name, unit]));
	const names = [...new Set([...sourceByName.keys(), ...targetByName.keys()])].sort(compareNames);

	const units = await Promise.all(
		names.map((name) =>
			reconcileUnit(options, name, sourceByName.get(name), targetByName.get(name)),
		),
	);

	return buildDiff(kind.id, options.sourceRoot, options.targetRoot, units);
}
