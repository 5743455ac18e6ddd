import type { CommandModule } from "yargs";
import { resolveContentDir } from "../../lib/content-dir.js";
import type { HttpClient } from "../../lib/content/http.js";
import {
	type ContentSyncOptions,
	checkContent,
	installContent,
	updateContent,
} from "../../lib/content/sync.js";
import { countDiff } from "../../lib/reconcile/diff.js";
import { formatDiff, formatSyncReport, reportHasFailures } from "../../lib/reconcile/summary.js";
import {
	type CommandContext,
	type GlobalArgs,
	resolveCommandContext,
	runCommand,
	type SyncFlags,
	withSyncFlags,
} from "../shared.js";

type ContentArgs = GlobalArgs &
	SyncFlags & {
		contentUrl?: string;
	};

export type ContentCommandOptions = {
	http: HttpClient;
};

const CONTENT_URL_OPTION = {
	type: "string",
	describe: "Base URL of the remote content tree",
} as const;

async function prepare(
	argv: ContentArgs,
	options: ContentCommandOptions,
): Promise<{ context: CommandContext; sync: ContentSyncOptions }> {
	const context = await resolveCommandContext(argv, { contentUrl: argv.contentUrl });
	const mirrorRoot = resolveContentDir(context.repoRoot, context.settings.contentDir).resolvedPath;
	return {
		context,
		sync: {
			store: context.store,
			http: options.http,
			logger: context.logger,
			mirrorRoot,
			baseUrl: context.settings.contentUrl,
		},
	};
}

export function createInstallCommand(
	options: ContentCommandOptions,
): CommandModule<object, ContentArgs> {
	return {
		command: "install",
		describe: "Download the remote content tree into the content directory",
		builder: (yargs) =>
			withSyncFlags(yargs.usage("unitsync install [options]"))
				.option("content-url", CONTENT_URL_OPTION)
				.example("unitsync install", "Download content into .unitsync/"),
		handler: async (argv) => {
			await runCommand(async () => {
				const { context, sync } = await prepare(argv, options);
				const result = await installContent({
					...sync,
					dryRun: argv.dryRun ?? false,
					force: argv.force ?? false,
				});
				if (!result?.report) {
					return 0;
				}
				console.log(formatSyncReport(result.report, context.jsonOutput));
				if (!result.report.dryRun) {
					context.logger.success(
						`Installed ${result.report.counts.filesWritten} files to ${sync.mirrorRoot}`,
					);
				}
				return reportHasFailures(result.report) ? 1 : 0;
			});
		},
	};
}

export function createUpdateCommand(
	options: ContentCommandOptions,
): CommandModule<object, ContentArgs> {
	return {
		command: "update",
		describe: "Download new and changed files listed in the remote manifest",
		builder: (yargs) =>
			withSyncFlags(yargs.usage("unitsync update [options]"))
				.option("content-url", CONTENT_URL_OPTION)
				.example("unitsync update", "Fetch files that changed upstream")
				.example("unitsync update --force", "Re-check every local file and repair edits"),
		handler: async (argv) => {
			await runCommand(async () => {
				const { context, sync } = await prepare(argv, options);
				const result = await updateContent({
					...sync,
					dryRun: argv.dryRun ?? false,
					force: argv.force ?? false,
				});
				if (!result?.report) {
					return 0;
				}
				console.log(formatSyncReport(result.report, context.jsonOutput));
				return reportHasFailures(result.report) ? 1 : 0;
			});
		},
	};
}

export function createCheckCommand(
	options: ContentCommandOptions,
): CommandModule<object, ContentArgs> {
	return {
		command: "check",
		describe: "Compare the content directory with the remote manifest without downloading",
		builder: (yargs) =>
			yargs.usage("unitsync check [options]").option("content-url", CONTENT_URL_OPTION),
		handler: async (argv) => {
			await runCommand(async () => {
				const { context, sync } = await prepare(argv, options);
				const result = await checkContent(sync);
				if (!result) {
					return 0;
				}
				console.log(formatDiff(result.diff, context.jsonOutput));
				const counts = countDiff(result.diff);
				if (counts.new + counts.modified > 0) {
					context.logger.info("Run 'unitsync update' to download updates.");
				} else {
					context.logger.success("Content is up to date.");
				}
				return counts.error > 0 ? 1 : 0;
			});
		},
	};
}
