import path from "node:path";
import process from "node:process";
import { intro, log, outro, spinner } from "@clack/prompts";
import type { Command } from "commander";
import pc from "picocolors";
import {
	askInstall,
	askPreCommit,
	collectAnswers,
	defaultAnswers,
} from "../prompts.js";
import {
	type GenerationStage,
	createProject,
} from "../scaffold/create-project.js";
import { assertTargetAvailable } from "../scaffold/fs.js";
import { postCreate } from "../scaffold/post-create.js";
import {
	type ProjectValues,
	type ScaffoldOptions,
	resolveProjectDir,
} from "../scaffold/values.js";
import { loadSettings } from "../settings.js";

const STAGE_MESSAGES: Record<GenerationStage, string> = {
	validating: "Checking target folder",
	"creating-root": "Creating project folder",
	copying: "Copying template files",
	"emitting-license": "Writing license",
	restructuring: "Arranging package layout",
	done: "Project files created",
};

export interface NewCommandOptions {
	yes?: boolean;
	test: boolean;
	git: boolean;
	docs?: boolean;
	install: boolean;
	preCommit: boolean;
}

function nextSteps(
	values: ProjectValues,
	location: string,
	installed: boolean,
): string {
	const run = values.standalone
		? "poetry run python main.py"
		: `poetry run ${path.basename(values.projectDir)}`;
	return [
		`1) cd ${location}`,
		installed ? undefined : "2) poetry install",
		`${installed ? 2 : 3}) ${run}`,
		"See the README.md file for more information.",
	]
		.filter((line) => line !== undefined)
		.join("\n");
}

export async function runNew(
	location: string,
	opts: NewCommandOptions,
	cwd = process.cwd(),
): Promise<void> {
	intro(pc.bold("create-py-app"));

	const projectDir = resolveProjectDir(location, cwd);
	await assertTargetAvailable(projectDir);
	log.info(`${pc.green("Creating a new project at")} ${projectDir}`);

	const settings = await loadSettings();
	const acceptDefaults = opts.yes === true;
	const folderName = path.basename(projectDir);
	const answers = acceptDefaults
		? defaultAnswers(folderName, settings)
		: await collectAnswers(folderName, settings);

	const install = opts.install && (acceptDefaults || (await askInstall()));
	const preCommit =
		opts.preCommit &&
		install &&
		opts.git &&
		(acceptDefaults || (await askPreCommit()));

	const options: ScaffoldOptions = {
		test: opts.test,
		git: opts.git,
		docs: opts.docs === true,
		install,
		preCommit,
		acceptDefaults,
	};

	const progress = spinner();
	progress.start(STAGE_MESSAGES.validating);
	let values: ProjectValues;
	try {
		values = await createProject({
			location,
			answers,
			options,
			cwd,
			useDefaultTemplate: settings.useDefaultTemplate,
			customTemplateDir: settings.templateFolder || undefined,
			onStage: (stage) => progress.message(STAGE_MESSAGES[stage]),
		});
	} catch (error) {
		progress.stop("Project creation failed", 1);
		throw error;
	}
	progress.stop(STAGE_MESSAGES.done);

	await postCreate(values, options);

	log.step(pc.bold("Next steps:"));
	log.message(nextSteps(values, location, install));
	outro(pc.green("Project created successfully."));
}

export function registerNewCommand(program: Command): void {
	program
		.command("new <location>")
		.description(
			"Create a new Python project. <location> is a single folder name, " +
				"or '.' for the current folder.",
		)
		.option("-y, --yes", "Accept defaults from settings without prompting")
		.option("--no-test", "Do not create a tests folder")
		.option("--no-git", "Do not initialise a git repository")
		.option("--docs", "Bootstrap MkDocs documentation (needs install)")
		.option("--no-install", "Do not run 'poetry install'")
		.option("--no-pre-commit", "Do not install the pre-commit hooks")
		.action(async (location: string, opts: NewCommandOptions) => {
			await runNew(location, opts);
		});
}
