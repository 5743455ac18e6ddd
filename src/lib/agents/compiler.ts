import { formatScalar } from "./frontmatter.js";
import type { AgentDefinition, CompiledAgent, ModelTier, Platform } from "./types.js";

const CLAUDE_CODE_MODELS: Record<ModelTier, string> = {
	fast: "haiku",
	balanced: "sonnet",
	capable: "opus",
};

const OPENCODE_MODELS: Record<ModelTier, string> = {
	fast: "anthropic/claude-haiku-4-20250514",
	balanced: "anthropic/claude-sonnet-4-20250514",
	capable: "anthropic/claude-opus-4-20250514",
};

function claudeCodeHeader(agent: AgentDefinition): string[] {
	const lines = [`name: ${agent.name}`, `description: ${formatScalar(agent.description)}`];
	if (agent.capabilities === "read-only") {
		lines.push("disallowedTools: Write, Edit");
	}
	lines.push(`model: ${CLAUDE_CODE_MODELS[agent.modelTier]}`);
	if (agent.skills.length > 0) {
		lines.push("skills:");
		for (const skill of agent.skills) {
			lines.push(`  - ${skill}`);
		}
	}
	return lines;
}

// opencode derives the agent name from the file name and has no skills field.
function opencodeHeader(agent: AgentDefinition): string[] {
	const lines = [
		`description: ${formatScalar(agent.description)}`,
		"mode: subagent",
		`model: ${OPENCODE_MODELS[agent.modelTier]}`,
	];
	if (agent.capabilities === "read-only") {
		lines.push("tools:", "  write: false", "  edit: false");
	}
	return lines;
}

export function compileAgent(agent: AgentDefinition, platform: Platform): CompiledAgent {
	const header = platform === "claude-code" ? claudeCodeHeader(agent) : opencodeHeader(agent);
	const body = agent.prompt ? `\n${agent.prompt}\n` : "";
	return {
		name: agent.name,
		fileName: `${agent.name}.md`,
		content: `---\n${header.join("\n")}\n---\n${body}`,
	};
}
