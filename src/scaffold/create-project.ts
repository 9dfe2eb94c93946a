import path from "node:path";
import process from "node:process";
import fs from "fs-extra";
import { FileSystemError, errorMessage } from "./errors.js";
import { assertTargetAvailable, createProjectRoot } from "./fs.js";
import { emitLicense } from "./license.js";
import { defaultTemplateDir } from "./paths.js";
import { docstring, quote, renderTemplate } from "./render.js";
import { restructureProject } from "./restructure.js";
import {
	DEFAULT_SKIP_NAMES,
	type TemplateSource,
	loadTemplateSource,
} from "./template-source.js";
import {
	NO_LICENSE,
	type ProjectValues,
	type ScaffoldOptions,
	packagingMode,
	parseProjectAnswers,
	resolveProjectDir,
} from "./values.js";
import { type PlannedWrite, buildWritePlan } from "./write-plan.js";

export type GenerationStage =
	| "validating"
	| "creating-root"
	| "copying"
	| "emitting-license"
	| "restructuring"
	| "done";

export interface CreateProjectRequest {
	/** Single directory name relative to `cwd`, or `.` */
	location: string;
	/** Unvalidated answers; parsed before anything is written. */
	answers: unknown;
	options: ScaffoldOptions;
	cwd?: string;
	/** Defaults to the bundled `templates/project`. */
	defaultTemplateDir?: string;
	useDefaultTemplate?: boolean;
	/** User template folder applied over the default one. */
	customTemplateDir?: string;
	licensesDir?: string;
	/** Clock for the license year. */
	now?: Date;
	onStage?: (stage: GenerationStage) => void;
}

export type RenderContext = ProjectValues & {
	slug: string;
	options: ScaffoldOptions;
	quote: (text: string) => string;
	docstring: (text: string) => string;
};

async function loadSources(
	request: CreateProjectRequest,
): Promise<TemplateSource[]> {
	const sources: TemplateSource[] = [];

	if (request.useDefaultTemplate !== false) {
		sources.push(
			await loadTemplateSource(
				request.defaultTemplateDir ?? defaultTemplateDir(),
				{ origin: "default", skipNames: DEFAULT_SKIP_NAMES },
			),
		);
	}
	if (request.customTemplateDir) {
		sources.push(
			await loadTemplateSource(request.customTemplateDir, { origin: "custom" }),
		);
	}

	return sources;
}

async function applyWrite(
	write: PlannedWrite,
	projectDir: string,
	context: RenderContext,
) {
	const target = path.join(projectDir, write.destination);

	// rendering happens first so template defects keep their own error type
	const content =
		write.kind === "render"
			? await renderTemplate(write.sourceRoot, write.relativePath, context)
			: undefined;

	try {
		if (write.kind === "directory") {
			await fs.mkdir(target);
		} else if (content !== undefined) {
			await fs.writeFile(target, content, "utf8");
		} else {
			const source = path.join(write.sourceRoot, write.relativePath);
			await fs.copyFile(source, target);
		}
	} catch (error) {
		throw new FileSystemError(
			`Failed to write '${write.destination}': ${errorMessage(error)}`,
			target,
			error,
		);
	}
}

/**
 * Generate a new project from the template sources.
 *
 * Nothing is written until the target, the answers and every template source
 * have been checked. After that a failure aborts the run and leaves whatever
 * was already written in place.
 */
export async function createProject(
	request: CreateProjectRequest,
): Promise<ProjectValues> {
	const report = request.onStage ?? (() => {});
	const cwd = request.cwd ?? process.cwd();

	report("validating");
	const answers = parseProjectAnswers(request.answers);
	const projectDir = resolveProjectDir(request.location, cwd);
	const targetState = await assertTargetAvailable(projectDir);
	const plan = buildWritePlan(await loadSources(request));

	const values: ProjectValues = { ...answers, projectDir };
	const context: RenderContext = {
		...values,
		slug: path.basename(projectDir),
		options: request.options,
		quote,
		docstring,
	};

	report("creating-root");
	await createProjectRoot(projectDir, targetState);

	report("copying");
	for (const write of plan) {
		await applyWrite(write, projectDir, context);
	}

	if (values.license !== NO_LICENSE) {
		report("emitting-license");
		await emitLicense({
			license: values.license,
			author: values.author,
			year: (request.now ?? new Date()).getFullYear(),
			destination: projectDir,
			licensesDir: request.licensesDir,
		});
	}

	report("restructuring");
	const mode = packagingMode(values);
	await restructureProject(projectDir, mode, request.options.test);

	report("done");
	return values;
}
