import { ValidationError, type ValidationIssue } from "../errors.js";
import { extractFrontmatter, type FrontmatterValue } from "./frontmatter.js";
import type { AgentDefinition, Capabilities, ModelTier } from "./types.js";

const CAPABILITY_ALIASES: Record<string, Capabilities> = {
	"read-only": "read-only",
	readonly: "read-only",
	"read-write": "read-write",
	readwrite: "read-write",
};

const MODEL_TIERS: Record<string, ModelTier> = {
	fast: "fast",
	balanced: "balanced",
	capable: "capable",
};

function readString(
	frontmatter: Record<string, FrontmatterValue>,
	key: string,
	issues: ValidationIssue[],
): string {
	const value = frontmatter[key];
	if (value === undefined) {
		issues.push({ field: key, message: "is required" });
		return "";
	}
	if (Array.isArray(value)) {
		issues.push({ field: key, message: "must be a string" });
		return "";
	}
	return value;
}

function readEnum<T extends string>(
	frontmatter: Record<string, FrontmatterValue>,
	key: string,
	allowed: Record<string, T>,
	fallback: T,
	expected: string,
	issues: ValidationIssue[],
): T {
	const value = frontmatter[key];
	if (value === undefined) {
		return fallback;
	}
	const resolved = typeof value === "string" ? allowed[value.toLowerCase()] : undefined;
	if (!resolved) {
		issues.push({
			field: key,
			message: `invalid value ${JSON.stringify(value)}, expected ${expected}`,
		});
		return fallback;
	}
	return resolved;
}

function readList(
	frontmatter: Record<string, FrontmatterValue>,
	key: string,
	issues: ValidationIssue[],
): string[] {
	const value = frontmatter[key];
	if (value === undefined) {
		return [];
	}
	if (!Array.isArray(value)) {
		issues.push({ field: key, message: "must be a list" });
		return [];
	}
	return value.filter((item) => item.length > 0);
}

/**
 * Parse an AGENT.md document. Capabilities default to read-write and the model tier to
 * balanced; unknown values and missing required fields are reported together.
 */
export function parseAgentDefinition(contents: string, sourcePath: string): AgentDefinition {
	const document = extractFrontmatter(contents);
	if (!document) {
		throw new ValidationError(`${sourcePath} must start with a front-matter block delimited by ---`);
	}

	const { frontmatter } = document;
	const issues: ValidationIssue[] = [];
	const name = readString(frontmatter, "name", issues);
	const description = readString(frontmatter, "description", issues);
	const capabilities = readEnum(
		frontmatter,
		"capabilities",
		CAPABILITY_ALIASES,
		"read-write",
		"read-only or read-write",
		issues,
	);
	const modelTier = readEnum(
		frontmatter,
		"model-tier",
		MODEL_TIERS,
		"balanced",
		"fast, balanced or capable",
		issues,
	);
	const skills = readList(frontmatter, "skills", issues);

	if (issues.length > 0) {
		throw new ValidationError(`Failed to parse ${sourcePath}`, issues);
	}

	return {
		name,
		description,
		capabilities,
		modelTier,
		skills,
		prompt: document.body,
		sourcePath,
	};
}
