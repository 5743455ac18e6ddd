import type { Platform } from "../agents/types.js";
import type { Verbosity } from "../logger.js";
import type { ToolSelection } from "../skills/tools.js";

export const DEFAULT_CONTENT_URL = "https://raw.githubusercontent.com/unitsync/content/main";

export type UnitsyncConfig = {
	/** Base URL of the remote content tree; the manifest lives at `<url>/.unitsync/manifest.json`. */
	contentUrl?: string;
	/** Content directory relative to the project root. */
	contentDir?: string;
	verbosity?: Verbosity;
	/** Skills target. */
	tool?: ToolSelection;
	/** Agents target. */
	platform?: Platform;
};

export function defineConfig(config: UnitsyncConfig): UnitsyncConfig {
	return config;
}
