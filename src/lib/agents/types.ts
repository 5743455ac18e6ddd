export const AGENT_FILE_NAME = "AGENT.md";

export type Capabilities = "read-only" | "read-write";

export type ModelTier = "fast" | "balanced" | "capable";

export type AgentDefinition = {
	name: string;
	description: string;
	capabilities: Capabilities;
	modelTier: ModelTier;
	skills: string[];
	/** Markdown body, trimmed. */
	prompt: string;
	sourcePath: string;
};

export const PLATFORMS = ["claude-code", "opencode"] as const;

export type Platform = (typeof PLATFORMS)[number];

export type CompiledAgent = {
	name: string;
	fileName: string;
	content: string;
};
