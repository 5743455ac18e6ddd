import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { collectFiles, compareNames, nodeContentStore } from "../../src/lib/store.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
	const dir = await mkdtemp(path.join(os.tmpdir(), "unitsync-store-"));
	try {
		await fn(dir);
	} finally {
		await rm(dir, { recursive: true, force: true });
	}
}

describe("content store", () => {
	it("reports existence and directories without throwing for missing paths", async () => {
		await withTempDir(async (dir) => {
			await writeFile(path.join(dir, "file.txt"), "x");

			expect(await nodeContentStore.exists(path.join(dir, "file.txt"))).toBe(true);
			expect(await nodeContentStore.isDirectory(path.join(dir, "file.txt"))).toBe(false);
			expect(await nodeContentStore.isDirectory(dir)).toBe(true);
			expect(await nodeContentStore.exists(path.join(dir, "missing"))).toBe(false);
			expect(await nodeContentStore.exists(path.join(dir, "file.txt", "child"))).toBe(false);
		});
	});

	it("creates parent directories when writing and copying", async () => {
		await withTempDir(async (dir) => {
			const written = path.join(dir, "a", "b", "out.txt");
			await nodeContentStore.write(written, "hello");
			const copied = path.join(dir, "c", "d", "copy.txt");
			await nodeContentStore.copy(written, copied);

			expect(await readFile(written, "utf8")).toBe("hello");
			expect(await readFile(copied, "utf8")).toBe("hello");
		});
	});

	it("lists entries sorted by name", async () => {
		await withTempDir(async (dir) => {
			await writeFile(path.join(dir, "b.txt"), "");
			await writeFile(path.join(dir, "B.txt"), "");
			await mkdir(path.join(dir, "a"));

			const entries = await nodeContentStore.list(dir);

			expect(entries.map((entry) => [entry.name, entry.isDirectory, entry.isFile])).toEqual([
				["B.txt", false, true],
				["a", true, false],
				["b.txt", false, true],
			]);
		});
	});

	it("maps a missing file read to a not-found error", async () => {
		await withTempDir(async (dir) => {
			const missing = path.join(dir, "missing.txt");
			await expect(nodeContentStore.read(missing)).rejects.toMatchObject({
				kind: "not-found",
				message: `Not found: ${missing}`,
			});
		});
	});

	it("orders names by code unit", () => {
		expect(["b", "a", "Z", "_"].sort(compareNames)).toEqual(["Z", "_", "a", "b"]);
	});
});

describe("collectFiles", () => {
	it("returns every nested file with posix relative paths in sorted order", async () => {
		await withTempDir(async (dir) => {
			await mkdir(path.join(dir, "scripts", "lib"), { recursive: true });
			await writeFile(path.join(dir, "SKILL.md"), "skill");
			await writeFile(path.join(dir, "scripts", "run.sh"), "run");
			await writeFile(path.join(dir, "scripts", "lib", "util.sh"), "util");

			const files = await collectFiles(nodeContentStore, dir);

			expect(files.map((file) => file.relativePath)).toEqual([
				"SKILL.md",
				"scripts/lib/util.sh",
				"scripts/run.sh",
			]);
			expect(files[1]?.path).toBe(path.join(dir, "scripts", "lib", "util.sh"));
		});
	});

	it("returns nothing for a missing root", async () => {
		await withTempDir(async (dir) => {
			await expect(collectFiles(nodeContentStore, path.join(dir, "missing"))).resolves.toEqual([]);
		});
	});
});
