import path from "node:path";
import { extractFrontmatter } from "../agents/frontmatter.js";
import { discoverUnits } from "../discovery.js";
import type { ContentStore } from "../store.js";
import { SKILL_FILE_NAME } from "./materializer.js";

export type SkillCatalogEntry = {
	name: string;
	location: string;
	description: string | null;
	installed: boolean;
};

function readDescription(contents: string): string | null {
	const document = extractFrontmatter(contents);
	const description = document?.frontmatter.description;
	if (typeof description !== "string") {
		return null;
	}
	const trimmed = description.trim();
	return trimmed.length > 0 ? trimmed : null;
}

export async function loadSkillCatalog(
	store: ContentStore,
	skillsRoot: string,
	targetRoot: string,
): Promise<SkillCatalogEntry[]> {
	const predicate = { type: "marker", fileName: SKILL_FILE_NAME } as const;
	const [sources, targets] = await Promise.all([
		discoverUnits(store, skillsRoot, predicate),
		discoverUnits(store, targetRoot, predicate),
	]);
	const installed = new Set(targets.map((unit) => unit.name));

	return await Promise.all(
		sources.map(async ({ name, location }) => {
			const contents = await store.read(path.join(location, SKILL_FILE_NAME));
			return {
				name,
				location,
				description: readDescription(contents.toString("utf8")),
				installed: installed.has(name),
			};
		}),
	);
}
