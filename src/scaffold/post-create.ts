import path from "node:path";
import fs from "fs-extra";
import { FileSystemError, errorMessage } from "./errors.js";
import { createGitRepo } from "./git.js";
import { templatesDir } from "./paths.js";
import { quote, renderTemplate } from "./render.js";
import { runCommand } from "./run-command.js";
import type { ProjectValues, ScaffoldOptions } from "./values.js";

export const MKDOCS_CONFIG = "mkdocs.yml";

async function bootstrapDocs(values: ProjectValues): Promise<void> {
	await runCommand(values.projectDir, "poetry", ["run", "mkdocs", "new", "."]);

	const config = await renderTemplate(
		templatesDir(),
		`${MKDOCS_CONFIG}.ejs`,
		{ name: values.name, description: values.description, quote },
	);
	const target = path.join(values.projectDir, MKDOCS_CONFIG);
	try {
		await fs.writeFile(target, config, "utf8");
	} catch (error) {
		throw new FileSystemError(
			`Failed to write ${MKDOCS_CONFIG}: ${errorMessage(error)}`,
			target,
			error,
		);
	}
}

async function installPreCommitHooks(projectDir: string): Promise<void> {
	await runCommand(projectDir, "poetry", ["run", "pre-commit", "install"]);
	await runCommand(projectDir, "poetry", ["run", "pre-commit", "autoupdate"]);
}

/**
 * Runs optional actions after project files are created.
 * Controlled by user prompt choices.
 */
export async function postCreate(
	values: ProjectValues,
	options: ScaffoldOptions,
): Promise<void> {
	if (options.install) {
		await runCommand(values.projectDir, "poetry", ["install"]);

		if (options.docs) {
			await bootstrapDocs(values);
		}
	}

	if (options.git) {
		await createGitRepo(values.projectDir);
	}

	// hooks are written into .git
	if (options.install && options.git && options.preCommit) {
		await installPreCommitHooks(values.projectDir);
	}
}
