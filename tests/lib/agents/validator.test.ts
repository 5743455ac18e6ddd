import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AgentDefinition } from "../../../src/lib/agents/types.js";
import {
	validateAgent,
	validateAgentName,
	validateDescription,
} from "../../../src/lib/agents/validator.js";
import { nodeContentStore } from "../../../src/lib/store.js";

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
	const dir = await mkdtemp(path.join(os.tmpdir(), "unitsync-validator-"));
	try {
		await fn(dir);
	} finally {
		await rm(dir, { recursive: true, force: true });
	}
}

function agentAt(dir: string, overrides: Partial<AgentDefinition> = {}): AgentDefinition {
	return {
		name: "reviewer",
		description: "Reviews code",
		capabilities: "read-write",
		modelTier: "balanced",
		skills: [],
		prompt: "",
		sourcePath: path.join(dir, "agents", "reviewer", "AGENT.md"),
		...overrides,
	};
}

describe("validateAgentName", () => {
	it("accepts lowercase names with single hyphens", () => {
		expect(validateAgentName("code-reviewer-2")).toEqual([]);
	});

	it("reports each rule the name breaks", () => {
		expect(validateAgentName("")).toEqual([{ field: "name", message: "Name cannot be empty" }]);
		expect(validateAgentName("Bad--name-").map((issue) => issue.message)).toEqual([
			"Name must contain only lowercase letters, digits, and hyphens",
			"Name cannot end with a hyphen",
			"Name cannot contain consecutive hyphens",
		]);
		expect(validateAgentName("-lead").map((issue) => issue.message)).toEqual([
			"Name cannot start with a hyphen",
		]);
		expect(validateAgentName("a".repeat(65)).map((issue) => issue.message)).toEqual([
			"Name exceeds maximum length of 64 characters",
		]);
	});
});

describe("validateDescription", () => {
	it("rejects blank and oversized descriptions", () => {
		expect(validateDescription("   ")).toEqual([
			{ field: "description", message: "Description cannot be empty" },
		]);
		expect(validateDescription("x".repeat(1025))).toEqual([
			{ field: "description", message: "Description exceeds maximum length of 1024 characters" },
		]);
	});
});

describe("validateAgent", () => {
	it("passes when referenced skills exist", async () => {
		await withTempDir(async (dir) => {
			const skillsRoot = path.join(dir, "skills");
			await mkdir(path.join(skillsRoot, "lint"), { recursive: true });
			await writeFile(path.join(skillsRoot, "lint", "SKILL.md"), "lint");

			await expect(
				validateAgent(nodeContentStore, agentAt(dir, { skills: ["lint"] }), skillsRoot),
			).resolves.toBeUndefined();
		});
	});

	it("collects directory mismatches and missing skills", async () => {
		await withTempDir(async (dir) => {
			const skillsRoot = path.join(dir, "skills");
			const agent = agentAt(dir, { name: "other", skills: ["missing"] });

			await expect(validateAgent(nodeContentStore, agent, skillsRoot)).rejects.toMatchObject({
				kind: "validation",
				issues: [
					{ field: "name", message: "Agent name 'other' does not match directory name 'reviewer'" },
					{
						field: "skills",
						message: `Referenced skill 'missing' not found at ${path.join(skillsRoot, "missing", "SKILL.md")}`,
					},
				],
			});
		});
	});
});
