import type { Fingerprint } from "../fingerprint.js";
import type { Logger } from "../logger.js";
import { applyDiff } from "../reconcile/apply.js";
import { countDiff } from "../reconcile/diff.js";
import type { Diff, SyncPolicy, SyncReport, UnitReport } from "../reconcile/types.js";
import type { ContentStore } from "../store.js";
import { type HttpClient, manifestUrl } from "./http.js";
import {
	type Manifest,
	type ManifestEntry,
	parseManifest,
	readCachedManifest,
	resolveManifestPath,
	writeCachedManifest,
} from "./manifest.js";
import { createRemoteMaterializer } from "./materializer.js";
import { reconcileManifest } from "./reconcile.js";

export type ContentSyncOptions = {
	store: ContentStore;
	http: HttpClient;
	logger: Logger;
	mirrorRoot: string;
	baseUrl: string;
};

export type ContentSyncResult = {
	remote: Manifest;
	diff: Diff;
	report: SyncReport | null;
};

export async function fetchRemoteManifest(http: HttpClient, baseUrl: string): Promise<Manifest> {
	const url = manifestUrl(baseUrl);
	return parseManifest(await http.getText(url), url);
}

async function loadRemote(options: ContentSyncOptions): Promise<Manifest> {
	options.logger.info("Downloading manifest...");
	const remote = await fetchRemoteManifest(options.http, options.baseUrl);
	options.logger.info(`Manifest loaded: version ${remote.version}, ${remote.files.length} files`);
	return remote;
}

function settledChecksum(
	unit: UnitReport,
	diff: Diff,
	remote: Map<string, Fingerprint>,
): Fingerprint | null {
	if (unit.status === "error") {
		return null;
	}
	const file = unit.files.find((entry) => entry.relativePath === unit.name);
	if (!file) {
		return null;
	}
	if (file.action === "written" || file.action === "unchanged") {
		return remote.get(unit.name) ?? null;
	}
	const previous = diff.units.find((entry) => entry.name === unit.name)?.files[0];
	return previous?.actualFingerprint ?? null;
}

/**
 * The manifest that describes the mirror after an apply: remote checksums for entries now in
 * sync, the previous checksum for entries that were skipped, failed or retained.
 */
export function buildAppliedManifest(remote: Manifest, diff: Diff, report: SyncReport): Manifest {
	const remoteChecksums = new Map(remote.files.map((entry) => [entry.path, entry.checksum]));
	const files: ManifestEntry[] = [];
	for (const unit of report.units) {
		const checksum = settledChecksum(unit, diff, remoteChecksums);
		if (checksum) {
			files.push({ path: unit.name, checksum });
		}
	}
	return { version: remote.version, files };
}

async function applyAndRecord(
	options: ContentSyncOptions,
	remote: Manifest,
	diff: Diff,
	policy: SyncPolicy,
	overwriteModified: boolean,
): Promise<SyncReport> {
	const report = await applyDiff(diff, policy, {
		store: options.store,
		materializer: createRemoteMaterializer({ http: options.http, manifest: remote }),
		overwriteModified,
	});
	if (!policy.dryRun) {
		await writeCachedManifest(
			options.store,
			options.mirrorRoot,
			buildAppliedManifest(remote, diff, report),
		);
	}
	return report;
}

/**
 * First download of the content tree. Files already present in the mirror are compared by
 * fingerprint and only overwritten with `force`.
 */
export async function installContent(
	options: ContentSyncOptions & SyncPolicy,
): Promise<ContentSyncResult | null> {
	const { store, logger, mirrorRoot } = options;
	if (await store.exists(resolveManifestPath(mirrorRoot))) {
		logger.warn(`Content is already installed in ${mirrorRoot}. Use 'update' to update it.`);
		return null;
	}

	const remote = await loadRemote(options);
	const diff = await reconcileManifest({
		store,
		mirrorRoot,
		baseUrl: options.baseUrl,
		remote,
		cached: null,
	});
	const report = await applyAndRecord(options, remote, diff, options, false);
	return { remote, diff, report };
}

/**
 * Bring the mirror up to date with the remote manifest. The cached manifest stands in for the
 * mirror's fingerprints; `force` hashes the live files instead, so local edits are repaired.
 */
export async function updateContent(
	options: ContentSyncOptions & SyncPolicy,
): Promise<ContentSyncResult | null> {
	const { store, logger, mirrorRoot } = options;
	const cached = await readCachedManifest(store, mirrorRoot);
	if (!cached && !(await store.exists(mirrorRoot))) {
		logger.warn(`No content found in ${mirrorRoot}. Use 'install' first.`);
		return null;
	}
	if (!cached) {
		logger.debug("Cached manifest missing or unreadable; fingerprinting the mirror instead.");
	}

	const remote = await loadRemote(options);
	if (cached) {
		logger.info(`Local: v${cached.version}, Remote: v${remote.version}`);
	}
	const diff = await reconcileManifest({
		store,
		mirrorRoot,
		baseUrl: options.baseUrl,
		remote,
		cached,
		verify: options.force ?? false,
	});

	const counts = countDiff(diff);
	if (counts.new + counts.modified === 0) {
		logger.info("No updates available.");
	} else {
		logger.info(`Updates available: ${counts.new} new, ${counts.modified} modified`);
	}
	const report = await applyAndRecord(options, remote, diff, options, true);
	return { remote, diff, report };
}

export async function checkContent(options: ContentSyncOptions): Promise<ContentSyncResult | null> {
	const { store, logger, mirrorRoot } = options;
	const cached = await readCachedManifest(store, mirrorRoot);
	if (!cached && !(await store.exists(mirrorRoot))) {
		logger.warn(`No content found in ${mirrorRoot}. Use 'install' first.`);
		return null;
	}

	const remote = await loadRemote(options);
	const diff = await reconcileManifest({
		store,
		mirrorRoot,
		baseUrl: options.baseUrl,
		remote,
		cached,
	});
	return { remote, diff, report: null };
}
