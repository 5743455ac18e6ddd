import type { ContentKind, MaterializedFile, Materializer } from "../reconcile/types.js";
import { type ContentStore, collectFiles } from "../store.js";

export const SKILL_FILE_NAME = "SKILL.md";

export function createSkillMaterializer(options: { store: ContentStore }): Materializer {
	return {
		kind: "verbatim",
		materialize: async (unit) => {
			const files = await collectFiles(options.store, unit.location);
			return {
				kind: "files",
				files: files.map(
					(file): MaterializedFile => ({
						relativePath: file.relativePath,
						origin: "copy",
						sourcePath: file.path,
					}),
				),
			};
		},
	};
}

export function skillsContentKind(options: { store: ContentStore; tool: string }): ContentKind {
	return {
		id: `skills:${options.tool}`,
		source: { type: "marker", fileName: SKILL_FILE_NAME },
		target: { type: "marker", fileName: SKILL_FILE_NAME },
		materializer: createSkillMaterializer(options),
	};
}
