import path from "node:path";
import { ValidationError, type ValidationIssue } from "../errors.js";
import type { ContentStore } from "../store.js";
import type { AgentDefinition } from "./types.js";

const MAX_NAME_LENGTH = 64;
const MAX_DESCRIPTION_LENGTH = 1024;
const SKILL_FILE_NAME = "SKILL.md";

export function validateAgentName(name: string): ValidationIssue[] {
	if (!name) {
		return [{ field: "name", message: "Name cannot be empty" }];
	}

	const issues: ValidationIssue[] = [];
	if (name.length > MAX_NAME_LENGTH) {
		issues.push({
			field: "name",
			message: `Name exceeds maximum length of ${MAX_NAME_LENGTH} characters`,
		});
	}
	if (!/^[a-z0-9-]+$/.test(name)) {
		issues.push({
			field: "name",
			message: "Name must contain only lowercase letters, digits, and hyphens",
		});
	}
	if (name.startsWith("-")) {
		issues.push({ field: "name", message: "Name cannot start with a hyphen" });
	}
	if (name.endsWith("-")) {
		issues.push({ field: "name", message: "Name cannot end with a hyphen" });
	}
	if (name.includes("--")) {
		issues.push({ field: "name", message: "Name cannot contain consecutive hyphens" });
	}
	return issues;
}

export function validateDescription(description: string): ValidationIssue[] {
	const issues: ValidationIssue[] = [];
	if (!description.trim()) {
		issues.push({ field: "description", message: "Description cannot be empty" });
	}
	if (description.length > MAX_DESCRIPTION_LENGTH) {
		issues.push({
			field: "description",
			message: `Description exceeds maximum length of ${MAX_DESCRIPTION_LENGTH} characters`,
		});
	}
	return issues;
}

async function validateSkills(
	store: ContentStore,
	skills: string[],
	skillsRoot: string,
): Promise<ValidationIssue[]> {
	const issues: ValidationIssue[] = [];
	for (const skill of skills) {
		const skillPath = path.join(skillsRoot, skill, SKILL_FILE_NAME);
		if (!(await store.exists(skillPath))) {
			issues.push({
				field: "skills",
				message: `Referenced skill '${skill}' not found at ${skillPath}`,
			});
		}
	}
	return issues;
}

/**
 * Check name format, that the name matches the agent's directory, the description bounds, and
 * that every referenced skill exists. All problems are reported in one ValidationError.
 */
export async function validateAgent(
	store: ContentStore,
	agent: AgentDefinition,
	skillsRoot: string,
): Promise<void> {
	const issues = validateAgentName(agent.name);
	const directoryName = path.basename(path.dirname(agent.sourcePath));
	if (agent.name && agent.name !== directoryName) {
		issues.push({
			field: "name",
			message: `Agent name '${agent.name}' does not match directory name '${directoryName}'`,
		});
	}
	issues.push(...validateDescription(agent.description));
	issues.push(...(await validateSkills(store, agent.skills, skillsRoot)));

	if (issues.length > 0) {
		throw new ValidationError("Agent validation failed", issues);
	}
}
