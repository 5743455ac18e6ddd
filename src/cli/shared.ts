import path from "node:path";
import type { Argv } from "yargs";
import { loadConfig } from "../lib/config/config-loader.js";
import { validateConfig } from "../lib/config/config-validate.js";
import {
	type ResolvedSettings,
	resolveSettings,
	type SettingOverrides,
} from "../lib/config/settings.js";
import { SyncError } from "../lib/errors.js";
import { createLogger, type Logger, type Verbosity } from "../lib/logger.js";
import { applyDiff } from "../lib/reconcile/apply.js";
import { diffFailures } from "../lib/reconcile/diff.js";
import { reconcile } from "../lib/reconcile/engine.js";
import { formatDiff, formatSyncReport, reportHasFailures } from "../lib/reconcile/summary.js";
import type { ContentKind } from "../lib/reconcile/types.js";
import { findProjectRoot } from "../lib/repo-root.js";
import { type ContentStore, nodeContentStore } from "../lib/store.js";

export type GlobalArgs = {
	path?: string;
	contentDir?: string;
	json?: boolean;
	verbose?: boolean;
	quiet?: boolean;
};

export type SyncFlags = {
	dryRun?: boolean;
	force?: boolean;
};

export type CommandContext = {
	repoRoot: string;
	configPath: string | null;
	settings: ResolvedSettings;
	logger: Logger;
	store: ContentStore;
	jsonOutput: boolean;
};

/**
 * A problem with how the command was invoked, reported as `Error: <message>` with exit code 1.
 */
export class CommandError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "CommandError";
	}
}

export function withSyncFlags<T>(yargs: Argv<T>) {
	return yargs
		.option("dry-run", {
			type: "boolean",
			default: false,
			describe: "Report what would change without writing anything",
		})
		.option("force", {
			type: "boolean",
			default: false,
			describe: "Overwrite target files that differ from the source",
		});
}

function resolveVerbosityFlag(argv: GlobalArgs): Verbosity | undefined {
	if (argv.quiet) {
		return 0;
	}
	if (argv.verbose) {
		return 2;
	}
	return undefined;
}

export async function resolveCommandContext(
	argv: GlobalArgs,
	overrides: SettingOverrides = {},
): Promise<CommandContext> {
	const store = nodeContentStore;
	const startDir = process.cwd();
	let repoRoot: string;
	if (argv.path) {
		repoRoot = path.resolve(startDir, argv.path);
		if (!(await store.isDirectory(repoRoot))) {
			throw new CommandError(`Project directory not found: ${repoRoot}`);
		}
	} else {
		repoRoot = await findProjectRoot(startDir);
	}

	const { config, configPath } = await loadConfig(repoRoot);
	const validation = validateConfig(config);
	if (!validation.valid) {
		throw new CommandError(
			`Invalid configuration in ${configPath}:\n- ${validation.errors.join("\n- ")}`,
		);
	}

	const settings = resolveSettings(validation.config, {
		...overrides,
		contentDir: argv.contentDir ?? overrides.contentDir,
		verbosity: resolveVerbosityFlag(argv) ?? overrides.verbosity,
	});
	const jsonOutput = argv.json ?? false;
	return {
		repoRoot,
		configPath,
		settings,
		logger: createLogger(settings.verbosity, jsonOutput),
		store,
		jsonOutput,
	};
}

/**
 * Run a command body. A non-zero result becomes the process exit code; known failures print
 * `Error: ...` and exit with 1, anything else is rethrown to the CLI's failure handler.
 */
export async function runCommand(task: () => Promise<number>): Promise<void> {
	try {
		const exitCode = await task();
		if (exitCode !== 0) {
			process.exitCode = exitCode;
		}
	} catch (error) {
		if (error instanceof CommandError || error instanceof SyncError) {
			console.error(`Error: ${error.message}`);
			process.exit(error instanceof SyncError ? error.exitCode : 1);
			return;
		}
		throw error;
	}
}

export async function runDiff(
	context: CommandContext,
	kind: ContentKind,
	sourceRoot: string,
	targetRoot: string,
): Promise<number> {
	const diff = await reconcile({ store: context.store, sourceRoot, targetRoot, kind });
	console.log(formatDiff(diff, context.jsonOutput));
	return diffFailures(diff).length > 0 ? 1 : 0;
}

export async function runSync(
	context: CommandContext,
	kind: ContentKind,
	sourceRoot: string,
	targetRoot: string,
	flags: SyncFlags,
): Promise<number> {
	const diff = await reconcile({ store: context.store, sourceRoot, targetRoot, kind });
	const report = await applyDiff(
		diff,
		{ dryRun: flags.dryRun ?? false, force: flags.force ?? false },
		{ store: context.store, materializer: kind.materializer },
	);
	console.log(formatSyncReport(report, context.jsonOutput));
	return reportHasFailures(report) ? 1 : 0;
}
