import path from "node:path";
import type { Fingerprint } from "../fingerprint.js";
import { buildDiff, unitFailure } from "../reconcile/diff.js";
import type { Diff, Status, UnitDiff } from "../reconcile/types.js";
import type { ContentStore } from "../store.js";
import { contentUrl, manifestUrl } from "./http.js";
import { checkEntryPath, deriveManifestFromMirror, type Manifest } from "./manifest.js";

export const CONTENT_KIND_ID = "content";

export type ManifestReconcileOptions = {
	store: ContentStore;
	mirrorRoot: string;
	baseUrl: string;
	remote: Manifest;
	cached: Manifest | null;
	/** Ignore the cached manifest and fingerprint the mirror's files instead. */
	verify?: boolean;
};

/**
 * Fingerprints of what the mirror holds. Cached entries are trusted only while their file
 * still exists; without a cache, or in verify mode, the live files are hashed.
 */
async function resolveBaseline(
	options: ManifestReconcileOptions,
): Promise<Map<string, Fingerprint>> {
	const { store, mirrorRoot, remote, cached } = options;
	if (!cached || options.verify) {
		const paths = [...remote.files, ...(cached?.files ?? [])].map((entry) => entry.path);
		const derived = await deriveManifestFromMirror(store, mirrorRoot, paths, remote.version);
		return new Map(derived.files.map((entry) => [entry.path, entry.checksum]));
	}

	const baseline = new Map<string, Fingerprint>();
	for (const entry of cached.files) {
		if (checkEntryPath(entry.path)) {
			continue;
		}
		if (await store.exists(path.join(mirrorRoot, entry.path))) {
			baseline.set(entry.path, entry.checksum);
		}
	}
	return baseline;
}

function classify(expected: Fingerprint, actual: Fingerprint | undefined): Status {
	if (actual === undefined) {
		return "new";
	}
	return expected === actual ? "unchanged" : "modified";
}

/**
 * Diff a remote manifest against the local mirror. Each manifest entry is a single-file unit
 * named by its path; entries that only the baseline knows are reported as removed. Failing to
 * read the mirror rejects the whole pass.
 */
export async function reconcileManifest(options: ManifestReconcileOptions): Promise<Diff> {
	const { mirrorRoot, baseUrl, remote } = options;
	const baseline = await resolveBaseline(options);

	const units = new Map<string, UnitDiff>();
	for (const entry of remote.files) {
		const sourceLocation = contentUrl(baseUrl, entry.path);
		const problem = checkEntryPath(entry.path);
		if (problem) {
			units.set(entry.path, {
				name: entry.path,
				status: "error",
				sourceLocation,
				targetBase: mirrorRoot,
				files: [],
				error: unitFailure(
					entry.path,
					"discover",
					new Error(`Invalid manifest entry: ${problem}`),
				),
			});
			continue;
		}
		const actual = baseline.get(entry.path);
		const status = classify(entry.checksum, actual);
		units.set(entry.path, {
			name: entry.path,
			status,
			sourceLocation,
			targetBase: mirrorRoot,
			files: [
				{
					relativePath: entry.path,
					targetPath: path.join(mirrorRoot, entry.path),
					status,
					expectedFingerprint: entry.checksum,
					actualFingerprint: actual ?? null,
				},
			],
		});
	}

	for (const [entryPath, checksum] of baseline) {
		if (units.has(entryPath)) {
			continue;
		}
		units.set(entryPath, {
			name: entryPath,
			status: "removed",
			sourceLocation: null,
			targetBase: mirrorRoot,
			files: [
				{
					relativePath: entryPath,
					targetPath: path.join(mirrorRoot, entryPath),
					status: "removed",
					expectedFingerprint: null,
					actualFingerprint: checksum,
				},
			],
		});
	}

	return buildDiff(CONTENT_KIND_ID, manifestUrl(baseUrl), mirrorRoot, [...units.values()]);
}
