import { PLATFORMS, type Platform } from "../agents/types.js";
import { parseVerbosity } from "../logger.js";
import { type ToolSelection, TOOLS } from "../skills/tools.js";
import type { UnitsyncConfig } from "./config-types.js";

export type ConfigValidationResult = {
	valid: boolean;
	errors: string[];
	config: UnitsyncConfig | null;
};

const KNOWN_KEYS = new Set(["contentUrl", "contentDir", "verbosity", "tool", "platform"]);
const TOOL_SELECTIONS: readonly string[] = ["auto", ...TOOLS];
const PLATFORM_NAMES: readonly string[] = PLATFORMS;

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return !!value && typeof value === "object" && !Array.isArray(value);
}

function normalizeString(value: unknown): string | null {
	if (typeof value !== "string") {
		return null;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}

function isHttpUrl(value: string): boolean {
	try {
		const url = new URL(value);
		return url.protocol === "http:" || url.protocol === "https:";
	} catch {
		return false;
	}
}

function isToolSelection(value: string): value is ToolSelection {
	return TOOL_SELECTIONS.includes(value);
}

function isPlatformName(value: string): value is Platform {
	return PLATFORM_NAMES.includes(value);
}

export function validateConfig(value: unknown): ConfigValidationResult {
	if (value === null || value === undefined) {
		return { valid: true, errors: [], config: null };
	}
	if (!isPlainObject(value)) {
		return { valid: false, errors: ["Config must export an object."], config: null };
	}

	const errors: string[] = [];
	const config: UnitsyncConfig = {};

	for (const key of Object.keys(value)) {
		if (!KNOWN_KEYS.has(key)) {
			errors.push(`Unknown config key: ${key}.`);
		}
	}

	if (value.contentUrl !== undefined) {
		const contentUrl = normalizeString(value.contentUrl);
		if (!contentUrl || !isHttpUrl(contentUrl)) {
			errors.push("contentUrl must be an http(s) URL.");
		} else {
			config.contentUrl = contentUrl;
		}
	}

	if (value.contentDir !== undefined) {
		const contentDir = normalizeString(value.contentDir);
		if (!contentDir) {
			errors.push("contentDir must be a non-empty string when provided.");
		} else {
			config.contentDir = contentDir;
		}
	}

	if (value.verbosity !== undefined) {
		const verbosity = parseVerbosity(value.verbosity);
		if (verbosity === null) {
			errors.push("verbosity must be 0, 1 or 2.");
		} else {
			config.verbosity = verbosity;
		}
	}

	if (value.tool !== undefined) {
		const tool = normalizeString(value.tool);
		if (!tool || !isToolSelection(tool)) {
			errors.push(`tool must be one of: ${TOOL_SELECTIONS.join(", ")}.`);
		} else {
			config.tool = tool;
		}
	}

	if (value.platform !== undefined) {
		const platform = normalizeString(value.platform);
		if (!platform || !isPlatformName(platform)) {
			errors.push(`platform must be one of: ${PLATFORM_NAMES.join(", ")}.`);
		} else {
			config.platform = platform;
		}
	}

	if (errors.length > 0) {
		return { valid: false, errors, config: null };
	}
	return { valid: true, errors, config };
}
