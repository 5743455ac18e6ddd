import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Manifest } from "../../../src/lib/content/manifest.js";
import { reconcileManifest } from "../../../src/lib/content/reconcile.js";
import { fingerprint } from "../../../src/lib/fingerprint.js";
import { findUnit } from "../../../src/lib/reconcile/diff.js";
import { nodeContentStore } from "../../../src/lib/store.js";

const BASE_URL = "https://content.test/repo";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
	const dir = await mkdtemp(path.join(os.tmpdir(), "unitsync-remote-diff-"));
	try {
		await fn(dir);
	} finally {
		await rm(dir, { recursive: true, force: true });
	}
}

async function writeMirror(mirrorRoot: string, files: Record<string, string>): Promise<void> {
	for (const [relativePath, contents] of Object.entries(files)) {
		const filePath = path.join(mirrorRoot, relativePath);
		await mkdir(path.dirname(filePath), { recursive: true });
		await writeFile(filePath, contents);
	}
}

function manifestOf(version: string, files: Record<string, string>): Manifest {
	return {
		version,
		files: Object.entries(files).map(([entryPath, contents]) => ({
			path: entryPath,
			checksum: fingerprint(contents),
		})),
	};
}

describe("reconcileManifest", () => {
	it("classifies entries against the cached manifest", async () => {
		await withTempDir(async (mirrorRoot) => {
			await writeMirror(mirrorRoot, { "same.md": "same", "changed.md": "old", "dropped.md": "d" });
			const cached = manifestOf("1", { "same.md": "same", "changed.md": "old", "dropped.md": "d" });
			const remote = manifestOf("2", { "same.md": "same", "changed.md": "new", "added.md": "a" });

			const diff = await reconcileManifest({
				store: nodeContentStore,
				mirrorRoot,
				baseUrl: BASE_URL,
				remote,
				cached,
			});

			expect(diff.kind).toBe("content");
			expect(diff.sourceRoot).toBe(`${BASE_URL}/.unitsync/manifest.json`);
			expect(diff.units.map((unit) => [unit.name, unit.status])).toEqual([
				["added.md", "new"],
				["changed.md", "modified"],
				["dropped.md", "removed"],
				["same.md", "unchanged"],
			]);
			expect(findUnit(diff, "added.md")).toEqual({
				name: "added.md",
				status: "new",
				sourceLocation: `${BASE_URL}/.unitsync/added.md`,
				targetBase: mirrorRoot,
				files: [
					{
						relativePath: "added.md",
						targetPath: path.join(mirrorRoot, "added.md"),
						status: "new",
						expectedFingerprint: fingerprint("a"),
						actualFingerprint: null,
					},
				],
			});
			expect(findUnit(diff, "dropped.md")?.files[0]?.actualFingerprint).toBe(fingerprint("d"));
		});
	});

	it("treats cached entries whose file is gone as new", async () => {
		await withTempDir(async (mirrorRoot) => {
			const cached = manifestOf("1", { "deleted.md": "x" });
			const remote = manifestOf("1", { "deleted.md": "x" });

			const diff = await reconcileManifest({
				store: nodeContentStore,
				mirrorRoot,
				baseUrl: BASE_URL,
				remote,
				cached,
			});

			expect(findUnit(diff, "deleted.md")?.status).toBe("new");
		});
	});

	it("hashes live files without a cache or in verify mode", async () => {
		await withTempDir(async (mirrorRoot) => {
			await writeMirror(mirrorRoot, { "notes.md": "edited locally" });
			const cached = manifestOf("1", { "notes.md": "original" });
			const remote = manifestOf("1", { "notes.md": "original" });
			const options = { store: nodeContentStore, mirrorRoot, baseUrl: BASE_URL, remote };

			const trusting = await reconcileManifest({ ...options, cached });
			const verifying = await reconcileManifest({ ...options, cached, verify: true });
			const uncached = await reconcileManifest({ ...options, cached: null });

			expect(findUnit(trusting, "notes.md")?.status).toBe("unchanged");
			expect(findUnit(verifying, "notes.md")?.status).toBe("modified");
			expect(findUnit(uncached, "notes.md")?.files[0]?.actualFingerprint).toBe(
				fingerprint("edited locally"),
			);
		});
	});

	it("reports unsafe entry paths as unit errors", async () => {
		await withTempDir(async (mirrorRoot) => {
			const remote = manifestOf("1", { "../escape.md": "x", "ok.md": "ok" });

			const diff = await reconcileManifest({
				store: nodeContentStore,
				mirrorRoot,
				baseUrl: BASE_URL,
				remote,
				cached: null,
			});

			const unit = findUnit(diff, "../escape.md");
			expect(unit?.status).toBe("error");
			if (unit?.status === "error") {
				expect(unit.error).toEqual({
					unitName: "../escape.md",
					stage: "discover",
					kind: "io",
					message: "Invalid manifest entry: path must not leave the content directory",
					relativePath: null,
				});
			}
			expect(findUnit(diff, "ok.md")?.status).toBe("new");
		});
	});
});
