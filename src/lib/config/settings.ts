import { DEFAULT_PLATFORM } from "../agents/platforms.js";
import type { Platform } from "../agents/types.js";
import { DEFAULT_CONTENT_DIR } from "../content-dir.js";
import { DEFAULT_VERBOSITY, type Verbosity } from "../logger.js";
import type { ToolSelection } from "../skills/tools.js";
import { DEFAULT_CONTENT_URL, type UnitsyncConfig } from "./config-types.js";

export type SettingSource = "flag" | "config" | "default";

export type ResolvedSettings = {
	contentUrl: string;
	contentDir: string;
	verbosity: Verbosity;
	tool: ToolSelection;
	platform: Platform;
	sources: Record<"contentUrl" | "contentDir" | "verbosity" | "tool" | "platform", SettingSource>;
};

export type SettingOverrides = Partial<Omit<ResolvedSettings, "sources">>;

function pick<T>(
	flag: T | undefined,
	config: T | undefined,
	fallback: T,
): { value: T; source: SettingSource } {
	if (flag !== undefined) {
		return { value: flag, source: "flag" };
	}
	if (config !== undefined) {
		return { value: config, source: "config" };
	}
	return { value: fallback, source: "default" };
}

/**
 * Command-line flags win over the config file, which wins over built-in defaults.
 */
export function resolveSettings(
	config: UnitsyncConfig | null,
	overrides: SettingOverrides = {},
): ResolvedSettings {
	const contentUrl = pick(overrides.contentUrl, config?.contentUrl, DEFAULT_CONTENT_URL);
	const contentDir = pick(overrides.contentDir, config?.contentDir, DEFAULT_CONTENT_DIR);
	const verbosity = pick(overrides.verbosity, config?.verbosity, DEFAULT_VERBOSITY);
	const tool = pick<ToolSelection>(overrides.tool, config?.tool, "auto");
	const platform = pick(overrides.platform, config?.platform, DEFAULT_PLATFORM);
	return {
		contentUrl: contentUrl.value,
		contentDir: contentDir.value,
		verbosity: verbosity.value,
		tool: tool.value,
		platform: platform.value,
		sources: {
			contentUrl: contentUrl.source,
			contentDir: contentDir.source,
			verbosity: verbosity.source,
			tool: tool.source,
			platform: platform.source,
		},
	};
}
