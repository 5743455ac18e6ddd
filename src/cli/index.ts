#!/usr/bin/env node
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { createFetchHttpClient, type HttpClient } from "../lib/content/http.js";
import { EXIT_CODES } from "../lib/errors.js";
import { agentsCommand } from "./commands/agents.js";
import { configCommand } from "./commands/config.js";
import {
	createCheckCommand,
	createInstallCommand,
	createUpdateCommand,
} from "./commands/content.js";
import { skillsCommand } from "./commands/skills.js";

const VERSION = "0.1.0";
const KNOWN_COMMANDS = new Set(["install", "update", "check", "agents", "skills", "config"]);
const COMMANDS_WITH_ACTION = new Set(["agents", "skills", "config"]);

function formatError(message: string, args: string[]) {
	if (message.startsWith("Unknown command:")) {
		return `Error: ${message}`;
	}

	if (message.startsWith("Unknown argument:")) {
		const raw = message.replace("Unknown argument:", "").trim();
		const option = raw.startsWith("-") ? raw : `--${raw}`;
		return `Error: Unknown option: ${option}`;
	}

	if (message.startsWith("Missing required argument:")) {
		const missing = message.replace("Missing required argument:", "").trim();
		return `Error: Missing required argument: ${missing}`;
	}

	if (message.startsWith("Not enough non-option arguments")) {
		const command = findCommand(args);
		if (command && COMMANDS_WITH_ACTION.has(command)) {
			return "Error: Missing required argument: action";
		}

		return "Error: Missing required argument";
	}

	return `Error: ${message}`;
}

type RunCliOptions = {
	http?: HttpClient;
};

function findCommand(args: string[]): string | undefined {
	return args.find((arg) => KNOWN_COMMANDS.has(arg));
}

function isCommandInvocation(args: string[]): boolean {
	return findCommand(args) !== undefined;
}

export function runCli(argv = process.argv, options: RunCliOptions = {}) {
	const args = hideBin(argv);
	const http = options.http ?? createFetchHttpClient({ userAgent: `unitsync/${VERSION}` });
	let handledFailure = false;

	return yargs(args)
		.scriptName("unitsync")
		.version(VERSION)
		.help()
		.strict()
		.strictCommands()
		.exitProcess(false)
		.fail((msg, err) => {
			if (handledFailure) {
				return;
			}

			handledFailure = true;
			const message = msg || err?.message || "Unknown error";
			console.error(formatError(message, args));
			const exitCode = isCommandInvocation(args)
				? EXIT_CODES["sync-error"]
				: EXIT_CODES["invalid-usage"];
			process.exit(exitCode);
		})
		.option("path", {
			type: "string",
			describe: "Project root (defaults to the nearest directory with .unitsync, .git or package.json)",
		})
		.option("content-dir", {
			type: "string",
			describe: "Content directory relative to the project root",
			defaultDescription: ".unitsync",
		})
		.option("json", {
			type: "boolean",
			default: false,
			describe: "Print the diff or sync report as JSON",
		})
		.option("verbose", {
			type: "boolean",
			describe: "Show debug output",
		})
		.option("quiet", {
			type: "boolean",
			describe: "Only print errors and results",
		})
		.conflicts("verbose", "quiet")
		.command(createInstallCommand({ http }))
		.command(createUpdateCommand({ http }))
		.command(createCheckCommand({ http }))
		.command(agentsCommand)
		.command(skillsCommand)
		.command(configCommand)
		.demandCommand(1, "Specify a command. Run unitsync --help for usage.")
		.epilog("Sources live in .unitsync/agents and .unitsync/skills; removed units are never deleted.")
		.parseAsync();
}

const entry = process.argv[1];
if (entry) {
	const entryUrl = pathToFileURL(realpathSync(entry)).href;
	if (entryUrl === import.meta.url) {
		void runCli();
	}
}
