import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { agentsContentKind, loadAgentCatalog } from "../../../src/lib/agents/materializer.js";
import { applyDiff } from "../../../src/lib/reconcile/apply.js";
import { findUnit } from "../../../src/lib/reconcile/diff.js";
import { reconcile } from "../../../src/lib/reconcile/engine.js";
import { nodeContentStore } from "../../../src/lib/store.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
	const dir = await mkdtemp(path.join(os.tmpdir(), "unitsync-agents-"));
	try {
		await fn(dir);
	} finally {
		await rm(dir, { recursive: true, force: true });
	}
}

async function writeAgent(agentsRoot: string, name: string, contents: string): Promise<void> {
	await mkdir(path.join(agentsRoot, name), { recursive: true });
	await writeFile(path.join(agentsRoot, name, "AGENT.md"), contents);
}

describe("agent materializer", () => {
	it("compiles new agents into the platform directory", async () => {
		await withTempDir(async (dir) => {
			const agentsRoot = path.join(dir, "agents");
			const skillsRoot = path.join(dir, "skills");
			const targetRoot = path.join(dir, ".claude", "agents");
			await writeAgent(
				agentsRoot,
				"reviewer",
				"---\nname: reviewer\ndescription: Reviews code\ncapabilities: read-only\n---\n\nBe thorough.\n",
			);
			const kind = agentsContentKind({ store: nodeContentStore, platform: "claude-code", skillsRoot });

			const diff = await reconcile({ store: nodeContentStore, sourceRoot: agentsRoot, targetRoot, kind });
			const report = await applyDiff(diff, {}, { store: nodeContentStore, materializer: kind.materializer });

			expect(kind.id).toBe("agents:claude-code");
			expect(report.units[0]?.files.map((file) => file.targetPath)).toEqual([
				path.join(targetRoot, "reviewer.md"),
			]);
			expect(await readFile(path.join(targetRoot, "reviewer.md"), "utf8")).toBe(
				"---\nname: reviewer\ndescription: Reviews code\ndisallowedTools: Write, Edit\nmodel: sonnet\n---\n\nBe thorough.\n",
			);

			const again = await reconcile({ store: nodeContentStore, sourceRoot: agentsRoot, targetRoot, kind });
			expect(findUnit(again, "reviewer")?.status).toBe("unchanged");
		});
	});

	it("reports an invalid agent as a unit error", async () => {
		await withTempDir(async (dir) => {
			const agentsRoot = path.join(dir, "agents");
			const skillsRoot = path.join(dir, "skills");
			const targetRoot = path.join(dir, ".opencode", "agents");
			await writeAgent(agentsRoot, "helper", "---\nname: helper\ndescription: Helps\nskills: [ghost]\n---\n");
			await mkdir(targetRoot, { recursive: true });
			await writeFile(path.join(targetRoot, "helper.md"), "old");
			const kind = agentsContentKind({ store: nodeContentStore, platform: "opencode", skillsRoot });

			const diff = await reconcile({ store: nodeContentStore, sourceRoot: agentsRoot, targetRoot, kind });

			const unit = findUnit(diff, "helper");
			expect(unit?.status).toBe("error");
			if (unit?.status === "error") {
				expect(unit.error.stage).toBe("materialize");
				expect(unit.error.kind).toBe("validation");
				expect(unit.error.message).toBe(
					`Agent validation failed:\n  - skills: Referenced skill 'ghost' not found at ${path.join(skillsRoot, "ghost", "SKILL.md")}`,
				);
			}
		});
	});
});

describe("loadAgentCatalog", () => {
	it("lists valid agents and keeps broken ones with their error", async () => {
		await withTempDir(async (dir) => {
			const agentsRoot = path.join(dir, "agents");
			await writeAgent(agentsRoot, "reviewer", "---\nname: reviewer\ndescription: Reviews code\n---\n");
			await writeAgent(agentsRoot, "broken", "no header");

			const catalog = await loadAgentCatalog(nodeContentStore, agentsRoot, path.join(dir, "skills"));

			expect(catalog.map((entry) => [entry.name, entry.agent?.description ?? null, entry.error])).toEqual([
				[
					"broken",
					null,
					`${path.join(agentsRoot, "broken", "AGENT.md")} must start with a front-matter block delimited by ---`,
				],
				["reviewer", "Reviews code", null],
			]);
		});
	});
});
