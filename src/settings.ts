import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { z } from "zod";
import { SettingsError, errorMessage } from "./scaffold/errors.js";
import { runCommand } from "./scaffold/run-command.js";
import { LICENSE_CHOICES } from "./scaffold/values.js";

const APP_NAME = "create-py-app";

export const settingsSchema = z.object({
	authorName: z.string().default(""),
	authorEmail: z.string().default(""),
	defaultLicense: z.enum(LICENSE_CHOICES).default("MIT"),
	/** Custom template folder applied over the default template. Empty = none. */
	templateFolder: z.string().default(""),
	useDefaultTemplate: z.boolean().default(true),
});

export type Settings = z.infer<typeof settingsSchema>;
export type SettingKey = keyof Settings;

export const SETTING_KEYS = settingsSchema.keyof().options;

export function getSettingsFilePath(): string {
	const override = process.env.CREATE_PY_APP_CONFIG_PATH;
	if (override) {
		return path.join(path.resolve(override), "settings.json");
	}
	const configHome =
		process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
	return path.join(configHome, APP_NAME, "settings.json");
}

function expandPath(input: string): string {
	return input.startsWith("~")
		? path.resolve(path.join(os.homedir(), input.slice(1)))
		: input;
}

async function ensureSettingsFile(file: string): Promise<void> {
	if (!(await fs.pathExists(file))) {
		await fs.outputJson(file, settingsSchema.parse({}), { spaces: 2 });
	}
}

function formatIssues(error: z.ZodError): string {
	return error.issues
		.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
		.join("; ");
}

export async function loadSettings(): Promise<Settings> {
	const file = getSettingsFilePath();
	let raw: unknown;
	try {
		await ensureSettingsFile(file);
		raw = await fs.readJson(file);
	} catch (error) {
		throw new SettingsError(
			`Could not read settings from ${file}: ${errorMessage(error)}`,
			file,
			error,
		);
	}

	const result = settingsSchema.safeParse(raw);
	if (!result.success) {
		throw new SettingsError(
			`Invalid settings in ${file}: ${formatIssues(result.error)}`,
			file,
		);
	}
	return {
		...result.data,
		templateFolder: expandPath(result.data.templateFolder),
	};
}

export async function saveSettings(settings: Settings): Promise<void> {
	const file = getSettingsFilePath();
	try {
		await fs.outputJson(file, settings, { spaces: 2 });
	} catch (error) {
		throw new SettingsError(
			`Could not write settings to ${file}: ${errorMessage(error)}`,
			file,
			error,
		);
	}
}

export function isSettingKey(key: string): key is SettingKey {
	return SETTING_KEYS.some((name) => name === key);
}

function parseBoolean(raw: string): boolean | undefined {
	const normalized = raw.trim().toLowerCase();
	if (["true", "yes", "y", "1"].includes(normalized)) return true;
	if (["false", "no", "n", "0"].includes(normalized)) return false;
	return undefined;
}

/** Parse a command-line value for `key`, validate the result and persist it. */
export async function updateSetting(
	key: string,
	raw: string,
): Promise<Settings> {
	const file = getSettingsFilePath();
	if (!isSettingKey(key)) {
		throw new SettingsError(
			`Unknown setting "${key}". Valid settings: ${SETTING_KEYS.join(", ")}`,
			file,
		);
	}

	const value = key === "useDefaultTemplate" ? parseBoolean(raw) : raw;
	if (value === undefined) {
		throw new SettingsError(
			`Setting "${key}" expects true or false, got "${raw}"`,
			file,
		);
	}

	const current = await loadSettings();
	const result = settingsSchema.safeParse({ ...current, [key]: value });
	if (!result.success) {
		throw new SettingsError(
			`Invalid value for "${key}": ${result.error.issues
				.map((issue) => issue.message)
				.join("; ")}`,
			file,
		);
	}

	await saveSettings(result.data);
	return result.data;
}

/** `$VISUAL`, then `$EDITOR`, split into the program and its arguments. */
export function editorCommand(env: NodeJS.ProcessEnv): [string, string[]] {
	const fallback = process.platform === "win32" ? "notepad" : "vi";
	const editor = env.VISUAL || env.EDITOR || fallback;
	const [cmd, ...args] = editor.trim().split(/\s+/);
	return [cmd, args];
}

/**
 * Open the settings file in the user's editor, creating it first if needed.
 * The edited file is read back so a broken edit is reported straight away.
 */
export async function editSettings(env = process.env): Promise<Settings> {
	const file = getSettingsFilePath();
	try {
		await ensureSettingsFile(file);
	} catch (error) {
		throw new SettingsError(
			`Could not create settings in ${file}: ${errorMessage(error)}`,
			file,
			error,
		);
	}

	const [cmd, args] = editorCommand(env);
	await runCommand(path.dirname(file), cmd, [...args, file]);
	return loadSettings();
}
