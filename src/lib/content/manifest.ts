import path from "node:path";
import { ValidationError, type ValidationIssue } from "../errors.js";
import { type Fingerprint, fingerprintFile, isFingerprint } from "../fingerprint.js";
import { type ContentStore, compareNames } from "../store.js";

export const MANIFEST_FILE_NAME = "manifest.json";

export type ManifestEntry = {
	/** Relative to the content directory, `/`-separated. */
	path: string;
	checksum: Fingerprint;
};

export type Manifest = {
	version: string;
	files: ManifestEntry[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

/**
 * Reason an entry path cannot be mirrored locally, or null when it is a plain relative path
 * inside the content directory.
 */
export function checkEntryPath(entryPath: string): string | null {
	if (!entryPath) {
		return "path is empty";
	}
	if (entryPath.includes("\\")) {
		return "path must use / separators";
	}
	if (entryPath.startsWith("/") || /^[A-Za-z]:/.test(entryPath)) {
		return "path must be relative";
	}
	const segments = entryPath.split("/");
	if (segments.some((segment) => segment === "..")) {
		return "path must not leave the content directory";
	}
	if (segments.some((segment) => segment === "" || segment === ".")) {
		return "path contains an empty or '.' segment";
	}
	if (entryPath === MANIFEST_FILE_NAME) {
		return `${MANIFEST_FILE_NAME} is reserved for the cached manifest`;
	}
	return null;
}

export function validateManifest(value: unknown): { manifest: Manifest | null; issues: ValidationIssue[] } {
	const issues: ValidationIssue[] = [];
	if (!isRecord(value)) {
		return { manifest: null, issues: [{ field: "manifest", message: "must be an object" }] };
	}
	if (typeof value.version !== "string" || !value.version.trim()) {
		issues.push({ field: "version", message: "must be a non-empty string" });
	}
	if (!Array.isArray(value.files)) {
		issues.push({ field: "files", message: "must be an array" });
		return { manifest: null, issues };
	}

	const files: ManifestEntry[] = [];
	value.files.forEach((entry: unknown, index: number) => {
		if (!isRecord(entry)) {
			issues.push({ field: `files[${index}]`, message: "must be an object" });
			return;
		}
		if (typeof entry.path !== "string") {
			issues.push({ field: `files[${index}].path`, message: "must be a string" });
			return;
		}
		if (!isFingerprint(entry.checksum)) {
			issues.push({
				field: `files[${index}].checksum`,
				message: "must be a lowercase hex SHA-256 digest",
			});
			return;
		}
		files.push({ path: entry.path, checksum: entry.checksum });
	});

	if (issues.length > 0 || typeof value.version !== "string") {
		return { manifest: null, issues };
	}
	return { manifest: { version: value.version, files }, issues };
}

export function parseManifest(text: string, origin: string): Manifest {
	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new ValidationError(`Invalid manifest at ${origin}`, [{ field: "manifest", message }]);
	}
	const { manifest, issues } = validateManifest(parsed);
	if (!manifest) {
		throw new ValidationError(`Invalid manifest at ${origin}`, issues);
	}
	return manifest;
}

export function serializeManifest(manifest: Manifest): string {
	const files = [...manifest.files].sort((left, right) => compareNames(left.path, right.path));
	return `${JSON.stringify({ version: manifest.version, files }, null, 2)}\n`;
}

export function resolveManifestPath(mirrorRoot: string): string {
	return path.join(mirrorRoot, MANIFEST_FILE_NAME);
}

/**
 * The last-applied manifest, or null when there is none or it cannot be read as a manifest.
 * The cache is only an optimization, so a damaged one is treated as absent.
 */
export async function readCachedManifest(
	store: ContentStore,
	mirrorRoot: string,
): Promise<Manifest | null> {
	const manifestPath = resolveManifestPath(mirrorRoot);
	if (!(await store.exists(manifestPath))) {
		return null;
	}
	const contents = await store.read(manifestPath);
	try {
		return parseManifest(contents.toString("utf8"), manifestPath);
	} catch (error) {
		if (error instanceof ValidationError) {
			return null;
		}
		throw error;
	}
}

export async function writeCachedManifest(
	store: ContentStore,
	mirrorRoot: string,
	manifest: Manifest,
): Promise<void> {
	await store.write(resolveManifestPath(mirrorRoot), serializeManifest(manifest));
}

/**
 * Rebuild manifest entries for `paths` from the files currently in the mirror. Paths without a
 * file, or that cannot be mirrored, are left out.
 */
export async function deriveManifestFromMirror(
	store: ContentStore,
	mirrorRoot: string,
	paths: Iterable<string>,
	version: string,
): Promise<Manifest> {
	const files: ManifestEntry[] = [];
	for (const entryPath of new Set(paths)) {
		if (checkEntryPath(entryPath)) {
			continue;
		}
		const filePath = path.join(mirrorRoot, entryPath);
		if (!(await store.exists(filePath)) || (await store.isDirectory(filePath))) {
			continue;
		}
		files.push({ path: entryPath, checksum: await fingerprintFile(store, filePath) });
	}
	files.sort((left, right) => compareNames(left.path, right.path));
	return { version, files };
}
