import path from "node:path";

export const DEFAULT_CONTENT_DIR = ".unitsync";

export type ContentCategory = "agents" | "skills";

export type ContentDirSource = "default" | "override";

export type ContentDirResolution = {
	requestedPath: string | null;
	resolvedPath: string;
	source: ContentDirSource;
};

function normalizeRequestedPath(value?: string | null): string | null {
	if (!value) {
		return null;
	}
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : null;
}

export function resolveContentDir(
	repoRoot: string,
	contentDir?: string | null,
): ContentDirResolution {
	const requestedPath = normalizeRequestedPath(contentDir);
	return {
		requestedPath,
		resolvedPath: path.resolve(repoRoot, requestedPath ?? DEFAULT_CONTENT_DIR),
		source: requestedPath ? "override" : "default",
	};
}

export function resolveCategoryRoot(
	repoRoot: string,
	category: ContentCategory,
	contentDir?: string | null,
): string {
	return path.join(resolveContentDir(repoRoot, contentDir).resolvedPath, category);
}

/**
 * Path relative to the project root with `/` separators, or the absolute path when it lies
 * outside the project.
 */
export function formatDisplayPath(repoRoot: string, absolutePath: string): string {
	const relative = path.relative(repoRoot, absolutePath);
	if (!relative) {
		return ".";
	}
	if (relative.startsWith("..") || path.isAbsolute(relative)) {
		return absolutePath;
	}
	return relative.split(path.sep).join("/");
}
