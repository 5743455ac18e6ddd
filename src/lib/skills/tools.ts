import path from "node:path";
import type { ContentStore } from "../store.js";

export const TOOLS = ["claude", "opencode"] as const;

export type Tool = (typeof TOOLS)[number];

export type ToolSelection = Tool | "auto";

const SKILL_PATHS: Record<Tool, string> = {
	claude: path.join(".claude", "skills"),
	opencode: path.join(".opencode", "skills"),
};

export function parseToolSelection(value: string): ToolSelection | null {
	const normalized = value.trim().toLowerCase();
	if (normalized === "auto" || normalized === "claude" || normalized === "opencode") {
		return normalized;
	}
	return null;
}

/**
 * `.opencode.json` at the project root selects opencode; everything else falls back to claude.
 */
export async function detectTool(store: ContentStore, repoRoot: string): Promise<Tool> {
	const opencodeConfig = path.join(repoRoot, ".opencode.json");
	if ((await store.exists(opencodeConfig)) && !(await store.isDirectory(opencodeConfig))) {
		return "opencode";
	}
	return "claude";
}

export async function resolveTool(
	store: ContentStore,
	repoRoot: string,
	selection: ToolSelection,
): Promise<Tool> {
	return selection === "auto" ? await detectTool(store, repoRoot) : selection;
}

export function resolveSkillTargetRoot(repoRoot: string, tool: Tool): string {
	return path.join(repoRoot, SKILL_PATHS[tool]);
}
