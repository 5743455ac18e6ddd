import path from "node:path";
import { PLATFORMS, type Platform } from "./types.js";

export type PlatformProfile = {
	name: Platform;
	displayName: string;
	agentPath: string;
};

export const PLATFORM_PROFILES: Record<Platform, PlatformProfile> = {
	"claude-code": {
		name: "claude-code",
		displayName: "Claude Code",
		agentPath: path.join(".claude", "agents"),
	},
	opencode: {
		name: "opencode",
		displayName: "OpenCode",
		agentPath: path.join(".opencode", "agents"),
	},
};

export const DEFAULT_PLATFORM: Platform = "claude-code";

const platformSet = new Set<string>(PLATFORMS);

export function isPlatform(value: string): value is Platform {
	return platformSet.has(value);
}

export function parsePlatform(value: string): Platform | null {
	const normalized = value.trim().toLowerCase();
	if (normalized === "claude") {
		return "claude-code";
	}
	return isPlatform(normalized) ? normalized : null;
}

export function resolveAgentTargetRoot(repoRoot: string, platform: Platform): string {
	return path.join(repoRoot, PLATFORM_PROFILES[platform].agentPath);
}
