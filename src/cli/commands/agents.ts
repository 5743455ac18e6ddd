import type { CommandModule } from "yargs";
import { agentsContentKind, loadAgentCatalog } from "../../lib/agents/materializer.js";
import {
	PLATFORM_PROFILES,
	parsePlatform,
	resolveAgentTargetRoot,
} from "../../lib/agents/platforms.js";
import { PLATFORMS, type Platform } from "../../lib/agents/types.js";
import { formatDisplayPath, resolveCategoryRoot } from "../../lib/content-dir.js";
import {
	type CommandContext,
	CommandError,
	type GlobalArgs,
	resolveCommandContext,
	runCommand,
	runDiff,
	runSync,
	type SyncFlags,
	withSyncFlags,
} from "../shared.js";

const ACTIONS = ["list", "diff", "sync"] as const;
type AgentsAction = (typeof ACTIONS)[number];

type AgentsArgs = GlobalArgs &
	SyncFlags & {
		action?: string;
		platform?: string;
	};

function parseAction(value: string | undefined): AgentsAction {
	const match = ACTIONS.find((action) => action === value);
	if (!match) {
		throw new CommandError(`Unknown agents action: ${value}. Use one of: ${ACTIONS.join(", ")}.`);
	}
	return match;
}

function parsePlatformFlag(value: string | undefined): Platform | undefined {
	if (value === undefined) {
		return undefined;
	}
	const platform = parsePlatform(value);
	if (!platform) {
		throw new CommandError(
			`Unknown platform: ${value}. Supported platforms: ${PLATFORMS.join(", ")}.`,
		);
	}
	return platform;
}

async function listAgents(context: CommandContext, agentsRoot: string, skillsRoot: string) {
	const catalog = await loadAgentCatalog(context.store, agentsRoot, skillsRoot);
	if (context.jsonOutput) {
		console.log(JSON.stringify(catalog, null, 2));
		return 0;
	}
	if (catalog.length === 0) {
		console.log(`No agents found in ${formatDisplayPath(context.repoRoot, agentsRoot)}.`);
		return 0;
	}
	for (const entry of catalog) {
		if (entry.agent) {
			console.log(`${entry.name} - ${entry.agent.description}`);
		} else {
			console.log(`${entry.name} (invalid)\n  ${entry.error.replace(/\n/g, "\n  ")}`);
		}
	}
	return 0;
}

export const agentsCommand: CommandModule<object, AgentsArgs> = {
	command: "agents <action>",
	describe: "List, diff, or sync agent definitions compiled for a platform",
	builder: (yargs) =>
		withSyncFlags(
			yargs
				.usage("unitsync agents <list|diff|sync> [options]")
				.positional("action", {
					type: "string",
					choices: ACTIONS,
					describe: "What to do with the agents",
				})
				.option("platform", {
					type: "string",
					describe: `Target platform (${PLATFORMS.join(", ")})`,
				}),
		)
			.example("unitsync agents diff", "Show which compiled agents are out of date")
			.example("unitsync agents sync --platform opencode", "Compile agents for OpenCode")
			.example("unitsync agents sync --force", "Overwrite agents that were edited in place"),
	handler: async (argv) => {
		await runCommand(async () => {
			const action = parseAction(argv.action);
			const context = await resolveCommandContext(argv, {
				platform: parsePlatformFlag(argv.platform),
			});
			const { repoRoot, settings, logger } = context;
			const agentsRoot = resolveCategoryRoot(repoRoot, "agents", settings.contentDir);
			const skillsRoot = resolveCategoryRoot(repoRoot, "skills", settings.contentDir);

			if (action === "list") {
				return await listAgents(context, agentsRoot, skillsRoot);
			}

			const platform = settings.platform;
			const targetRoot = resolveAgentTargetRoot(repoRoot, platform);
			const kind = agentsContentKind({ store: context.store, platform, skillsRoot });
			logger.info(
				`Agents: ${formatDisplayPath(repoRoot, agentsRoot)} -> ` +
					`${formatDisplayPath(repoRoot, targetRoot)} (${PLATFORM_PROFILES[platform].displayName})`,
			);

			if (action === "diff") {
				return await runDiff(context, kind, agentsRoot, targetRoot);
			}
			return await runSync(context, kind, agentsRoot, targetRoot, argv);
		});
	},
};
