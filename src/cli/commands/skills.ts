import type { CommandModule } from "yargs";
import { formatDisplayPath, resolveCategoryRoot } from "../../lib/content-dir.js";
import { loadSkillCatalog } from "../../lib/skills/catalog.js";
import { skillsContentKind } from "../../lib/skills/materializer.js";
import {
	parseToolSelection,
	resolveSkillTargetRoot,
	resolveTool,
	TOOLS,
	type ToolSelection,
} from "../../lib/skills/tools.js";
import {
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
type SkillsAction = (typeof ACTIONS)[number];

type SkillsArgs = GlobalArgs &
	SyncFlags & {
		action?: string;
		tool?: string;
	};

function parseAction(value: string | undefined): SkillsAction {
	const match = ACTIONS.find((action) => action === value);
	if (!match) {
		throw new CommandError(`Unknown skills action: ${value}. Use one of: ${ACTIONS.join(", ")}.`);
	}
	return match;
}

function parseToolFlag(value: string | undefined): ToolSelection | undefined {
	if (value === undefined) {
		return undefined;
	}
	const tool = parseToolSelection(value);
	if (!tool) {
		throw new CommandError(`Unknown tool: ${value}. Supported tools: auto, ${TOOLS.join(", ")}.`);
	}
	return tool;
}

export const skillsCommand: CommandModule<object, SkillsArgs> = {
	command: "skills <action>",
	describe: "List, diff, or sync skill directories into a tool's skills folder",
	builder: (yargs) =>
		withSyncFlags(
			yargs
				.usage("unitsync skills <list|diff|sync> [options]")
				.positional("action", {
					type: "string",
					choices: ACTIONS,
					describe: "What to do with the skills",
				})
				.option("tool", {
					type: "string",
					describe: `Target tool (auto, ${TOOLS.join(", ")}); auto checks for .opencode.json`,
				}),
		)
			.example("unitsync skills list", "List skills and whether they are installed")
			.example("unitsync skills sync --dry-run", "Preview which skill files would be copied"),
	handler: async (argv) => {
		await runCommand(async () => {
			const action = parseAction(argv.action);
			const context = await resolveCommandContext(argv, { tool: parseToolFlag(argv.tool) });
			const { repoRoot, settings, logger, store } = context;
			const skillsRoot = resolveCategoryRoot(repoRoot, "skills", settings.contentDir);
			const tool = await resolveTool(store, repoRoot, settings.tool);
			const targetRoot = resolveSkillTargetRoot(repoRoot, tool);

			if (action === "list") {
				const catalog = await loadSkillCatalog(store, skillsRoot, targetRoot);
				if (context.jsonOutput) {
					console.log(JSON.stringify(catalog, null, 2));
					return 0;
				}
				if (catalog.length === 0) {
					console.log(`No skills found in ${formatDisplayPath(repoRoot, skillsRoot)}.`);
					return 0;
				}
				for (const skill of catalog) {
					const description = skill.description ? ` - ${skill.description}` : "";
					const installed = skill.installed ? " [installed]" : "";
					console.log(`${skill.name}${description}${installed}`);
				}
				return 0;
			}

			const kind = skillsContentKind({ store, tool });
			logger.info(
				`Skills: ${formatDisplayPath(repoRoot, skillsRoot)} -> ` +
					`${formatDisplayPath(repoRoot, targetRoot)} (${tool})`,
			);
			if (action === "diff") {
				return await runDiff(context, kind, skillsRoot, targetRoot);
			}
			return await runSync(context, kind, skillsRoot, targetRoot, argv);
		});
	},
};
