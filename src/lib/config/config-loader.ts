import { stat } from "node:fs/promises";
import path from "node:path";
import { createJiti } from "jiti";

const CONFIG_FILES = [
	"unitsync.config.ts",
	"unitsync.config.mts",
	"unitsync.config.cts",
	"unitsync.config.js",
	"unitsync.config.mjs",
	"unitsync.config.cjs",
] as const;

async function fileExists(filePath: string): Promise<boolean> {
	try {
		const stats = await stat(filePath);
		return stats.isFile();
	} catch {
		return false;
	}
}

export async function findConfigPath(repoRoot: string): Promise<string | null> {
	for (const fileName of CONFIG_FILES) {
		const candidate = path.join(repoRoot, fileName);
		if (await fileExists(candidate)) {
			return candidate;
		}
	}
	return null;
}

function resolveConfigExport(moduleValue: unknown): unknown {
	if (moduleValue && typeof moduleValue === "object" && "default" in moduleValue) {
		return moduleValue.default ?? moduleValue;
	}
	return moduleValue;
}

/**
 * Load the first `unitsync.config.*` at the project root. The raw export is returned as is;
 * run it through `validateConfig` before use.
 */
export async function loadConfig(
	repoRoot: string,
): Promise<{ config: unknown; configPath: string | null }> {
	const configPath = await findConfigPath(repoRoot);
	if (!configPath) {
		return { config: null, configPath: null };
	}

	const jiti = createJiti(import.meta.url, { interopDefault: true, moduleCache: false });
	const loaded = await jiti.import(configPath);
	return { config: resolveConfigExport(loaded) ?? null, configPath };
}
