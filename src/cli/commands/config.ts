import type { CommandModule } from "yargs";
import type { ResolvedSettings } from "../../lib/config/settings.js";
import {
	CommandError,
	type GlobalArgs,
	resolveCommandContext,
	runCommand,
} from "../shared.js";

const ACTIONS = ["show", "path", "get"] as const;

const SETTING_KEYS = ["contentUrl", "contentDir", "verbosity", "tool", "platform"] as const;
type SettingKey = (typeof SETTING_KEYS)[number];

type ConfigArgs = GlobalArgs & {
	action?: string;
	key?: string;
};

function parseSettingKey(value: string | undefined): SettingKey {
	if (value === undefined) {
		throw new CommandError(`Missing setting key. Use one of: ${SETTING_KEYS.join(", ")}.`);
	}
	const match = SETTING_KEYS.find((key) => key === value);
	if (!match) {
		throw new CommandError(
			`Unknown setting: ${value}. Use one of: ${SETTING_KEYS.join(", ")}.`,
		);
	}
	return match;
}

function formatSetting(settings: ResolvedSettings, key: SettingKey): string {
	return `${key}: ${settings[key]} (${settings.sources[key]})`;
}

export const configCommand: CommandModule<object, ConfigArgs> = {
	command: "config <action> [key]",
	describe: "Show the resolved configuration or the config file in use",
	builder: (yargs) =>
		yargs
			.usage("unitsync config <show|path|get> [key]")
			.positional("action", {
				type: "string",
				choices: ACTIONS,
				describe: "show: resolved settings; path: config file location; get: one setting",
			})
			.positional("key", {
				type: "string",
				describe: `Setting to print with get (${SETTING_KEYS.join(", ")})`,
			})
			.example("unitsync config get platform", "Print the platform agents compile for")
			.epilog(
				"Config: auto-discovered as unitsync.config.(ts|mts|cts|js|mjs|cjs) in the project root.",
			),
	handler: async (argv) => {
		await runCommand(async () => {
			const context = await resolveCommandContext(argv);
			const { configPath, settings } = context;

			if (argv.action === "path") {
				console.log(configPath ?? "No config file found.");
				return 0;
			}
			if (argv.action === "get") {
				const key = parseSettingKey(argv.key);
				if (context.jsonOutput) {
					console.log(
						JSON.stringify({ key, value: settings[key], source: settings.sources[key] }, null, 2),
					);
					return 0;
				}
				console.log(formatSetting(settings, key));
				return 0;
			}
			if (argv.action !== "show") {
				throw new CommandError(`Unknown config action: ${argv.action}.`);
			}

			if (context.jsonOutput) {
				console.log(JSON.stringify({ configPath, settings }, null, 2));
				return 0;
			}
			console.log(`Config file: ${configPath ?? "none"}`);
			for (const key of SETTING_KEYS) {
				console.log(formatSetting(settings, key));
			}
			return 0;
		});
	},
};
