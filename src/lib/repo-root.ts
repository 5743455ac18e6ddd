import { stat } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_CONTENT_DIR } from "./content-dir.js";

const ROOT_MARKERS = [DEFAULT_CONTENT_DIR, ".git", "package.json"] as const;

async function pathExists(candidate: string): Promise<boolean> {
	try {
		await stat(candidate);
		return true;
	} catch {
		return false;
	}
}

async function findUp(startDir: string, marker: string): Promise<string | null> {
	let current = path.resolve(startDir);
	let previous = "";

	while (current !== previous) {
		if (await pathExists(path.join(current, marker))) {
			return current;
		}

		previous = current;
		current = path.dirname(current);
	}

	return null;
}

/**
 * Nearest ancestor holding a content directory, else a `.git` checkout, else a package.json.
 * Falls back to `startDir` itself.
 */
export async function findProjectRoot(startDir: string): Promise<string> {
	for (const marker of ROOT_MARKERS) {
		const root = await findUp(startDir, marker);
		if (root) {
			return root;
		}
	}
	return path.resolve(startDir);
}
