import path from "node:path";
import { discoverUnits } from "../discovery.js";
import { describeError } from "../errors.js";
import type { ContentKind, Materializer } from "../reconcile/types.js";
import type { ContentStore } from "../store.js";
import { compileAgent } from "./compiler.js";
import { parseAgentDefinition } from "./parser.js";
import { AGENT_FILE_NAME, type AgentDefinition, type Platform } from "./types.js";
import { validateAgent } from "./validator.js";

export type AgentMaterializerOptions = {
	store: ContentStore;
	platform: Platform;
	skillsRoot: string;
};

async function readAgent(store: ContentStore, location: string): Promise<AgentDefinition> {
	const sourcePath = path.join(location, AGENT_FILE_NAME);
	const contents = await store.read(sourcePath);
	return parseAgentDefinition(contents.toString("utf8"), sourcePath);
}

export function createAgentMaterializer(options: AgentMaterializerOptions): Materializer {
	const { store, platform, skillsRoot } = options;
	return {
		kind: "compiling",
		materialize: async (unit) => {
			const agent = await readAgent(store, unit.location);
			await validateAgent(store, agent, skillsRoot);
			const compiled = compileAgent(agent, platform);
			return {
				kind: "file",
				file: {
					relativePath: compiled.fileName,
					origin: "bytes",
					contents: Buffer.from(compiled.content, "utf8"),
				},
			};
		},
	};
}

export function agentsContentKind(options: AgentMaterializerOptions): ContentKind {
	return {
		id: `agents:${options.platform}`,
		source: { type: "marker", fileName: AGENT_FILE_NAME },
		target: { type: "suffix", suffix: ".md" },
		materializer: createAgentMaterializer(options),
	};
}

export type AgentCatalogEntry =
	| { name: string; location: string; agent: AgentDefinition; error: null }
	| { name: string; location: string; agent: null; error: string };

/**
 * Every agent directory under `agentsRoot`, parsed and validated. Broken agents are listed
 * with their error instead of failing the listing.
 */
export async function loadAgentCatalog(
	store: ContentStore,
	agentsRoot: string,
	skillsRoot: string,
): Promise<AgentCatalogEntry[]> {
	const units = await discoverUnits(store, agentsRoot, { type: "marker", fileName: AGENT_FILE_NAME });
	return await Promise.all(
		units.map(async ({ name, location }): Promise<AgentCatalogEntry> => {
			try {
				const agent = await readAgent(store, location);
				await validateAgent(store, agent, skillsRoot);
				return { name, location, agent, error: null };
			} catch (error) {
				return { name, location, agent: null, error: describeError(error) };
			}
		}),
	);
}
