import type { MockInstance } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runCli } from "../../src/cli/index.js";
import type { HttpClient } from "../../src/lib/content/http.js";
import { NetworkError } from "../../src/lib/errors.js";
import { fingerprint } from "../../src/lib/fingerprint.js";

const BASE_URL = "https://content.test/repo";

function createFakeHttp(version: string, files: Record<string, string>): HttpClient {
	const lookup = (url: string): string => {
		if (url === `${BASE_URL}/.unitsync/manifest.json`) {
			return JSON.stringify({
				version,
				files: Object.entries(files).map(([entryPath, contents]) => ({
					path: entryPath,
					checksum: fingerprint(contents),
				})),
			});
		}
		const entryPath = decodeURIComponent(url.replace(`${BASE_URL}/.unitsync/`, ""));
		const contents = files[entryPath];
		if (contents === undefined) {
			throw new NetworkError(url, `Request to ${url} failed with HTTP 404`, 404);
		}
		return contents;
	};
	return {
		getText: async (url) => lookup(url),
		getBytes: async (url) => Buffer.from(lookup(url)),
	};
}

const V1 = createFakeHttp("1", { "agents/a/AGENT.md": "A1", "notes.md": "N1" });
const V2 = createFakeHttp("2", { "agents/a/AGENT.md": "A1", "notes.md": "N2" });

async function withTempRepo(fn: (root: string) => Promise<void>): Promise<void> {
	const root = await mkdtemp(path.join(os.tmpdir(), "unitsync-content-cmd-"));
	try {
		await fn(root);
	} finally {
		await rm(root, { recursive: true, force: true });
	}
}

describe.sequential("content commands", () => {
	let logSpy: MockInstance<typeof console.log>;
	let errorSpy: MockInstance<typeof console.log>;
	let exitSpy: MockInstance<typeof process.exit>;

	beforeEach(() => {
		logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		exitSpy = vi.spyOn(process, "exit").mockImplementation(() => undefined as never);
		process.exitCode = undefined;
	});

	afterEach(() => {
		logSpy.mockRestore();
		errorSpy.mockRestore();
		exitSpy.mockRestore();
		process.exitCode = undefined;
	});

	it("installs the remote content tree", async () => {
		await withTempRepo(async (root) => {
			await runCli(["node", "unitsync", "install", "--path", root, "--content-url", BASE_URL], {
				http: V1,
			});

			const mirrorRoot = path.join(root, ".unitsync");
			expect(logSpy.mock.calls).toEqual([
				["Downloading manifest..."],
				["Manifest loaded: version 1, 2 files"],
				[
					"Wrote agents/a/AGENT.md (1 file)\n" +
						"Wrote notes.md (1 file)\n" +
						"Summary: 2 applied, 0 partial, 0 skipped, 0 unchanged, 0 retained, 0 failed (2 files written)",
				],
				[`Installed 2 files to ${mirrorRoot}`],
			]);
			expect(await readFile(path.join(mirrorRoot, "notes.md"), "utf8")).toBe("N1");
			expect(exitSpy).not.toHaveBeenCalled();
		});
	});

	it("warns instead of installing twice", async () => {
		await withTempRepo(async (root) => {
			const argv = ["node", "unitsync", "install", "--path", root, "--content-url", BASE_URL];
			await runCli(argv, { http: V1 });
			errorSpy.mockClear();

			await runCli(argv, { http: V1 });

			expect(errorSpy).toHaveBeenCalledWith(
				`Warning: Content is already installed in ${path.join(root, ".unitsync")}. Use 'update' to update it.`,
			);
			expect(process.exitCode).toBeUndefined();
		});
	});

	it("checks for and applies updates", async () => {
		await withTempRepo(async (root) => {
			await runCli(["node", "unitsync", "install", "--path", root, "--content-url", BASE_URL], {
				http: V1,
			});
			logSpy.mockClear();

			await runCli(["node", "unitsync", "check", "--path", root, "--content-url", BASE_URL], {
				http: V2,
			});

			expect(logSpy.mock.calls).toEqual([
				["Downloading manifest..."],
				["Manifest loaded: version 2, 2 files"],
				["= agents/a/AGENT.md\n~ notes.md\n    ~ notes.md\nSummary: 0 new, 1 modified, 1 unchanged, 0 removed"],
				["Run 'unitsync update' to download updates."],
			]);
			logSpy.mockClear();

			await runCli(["node", "unitsync", "update", "--path", root, "--content-url", BASE_URL], {
				http: V2,
			});

			expect(logSpy.mock.calls).toEqual([
				["Downloading manifest..."],
				["Manifest loaded: version 2, 2 files"],
				["Local: v1, Remote: v2"],
				["Updates available: 0 new, 1 modified"],
				[
					"Wrote notes.md (1 file)\n" +
						"Summary: 1 applied, 0 partial, 0 skipped, 1 unchanged, 0 retained, 0 failed (1 file written)",
				],
			]);
			expect(await readFile(path.join(root, ".unitsync", "notes.md"), "utf8")).toBe("N2");
			logSpy.mockClear();

			await runCli(["node", "unitsync", "check", "--path", root, "--content-url", BASE_URL, "--quiet"], {
				http: V2,
			});

			expect(logSpy.mock.calls).toEqual([
				["= agents/a/AGENT.md\n= notes.md\nSummary: 0 new, 0 modified, 2 unchanged, 0 removed"],
			]);
		});
	});

	it("reports an unreachable content server", async () => {
		await withTempRepo(async (root) => {
			await runCli(
				["node", "unitsync", "install", "--path", root, "--content-url", `${BASE_URL}/missing`],
				{ http: V1 },
			);

			const url = `${BASE_URL}/missing/.unitsync/manifest.json`;
			expect(errorSpy).toHaveBeenCalledWith(`Error: Request to ${url} failed with HTTP 404`);
			expect(exitSpy).toHaveBeenCalledWith(1);
		});
	});
});
