import { log } from "@clack/prompts";
import type { Command } from "commander";
import pc from "picocolors";
import {
	type Settings,
	editSettings,
	getSettingsFilePath,
	isSettingKey,
	loadSettings,
	updateSetting,
} from "../settings.js";

export function formatSettings(settings: Settings): string {
	const rows = Object.entries(settings);
	const padding = Math.max(...rows.map(([key]) => key.length));
	return rows
		.map(
			([key, value]) =>
				`${pc.cyan(key.padStart(padding))} : ${pc.green(String(value))}`,
		)
		.join("\n");
}

export function registerConfigCommand(program: Command): void {
	const config = program
		.command("config")
		.description("Show or change the settings");

	config
		.command("show")
		.description("Show the current settings")
		.action(async () => {
			const settings = await loadSettings();
			log.info(pc.dim(getSettingsFilePath()));
			log.message(formatSettings(settings));
		});

	config
		.command("set <key> <value>")
		.description("Change one setting")
		.action(async (key: string, value: string) => {
			const settings = await updateSetting(key, value);
			if (isSettingKey(key)) {
				log.success(`${key} set to ${pc.green(String(settings[key]))}`);
			}
		});

	config
		.command("edit")
		.description("Open the settings file in $VISUAL or $EDITOR")
		.action(async () => {
			const settings = await editSettings();
			log.message(formatSettings(settings));
		});
}
