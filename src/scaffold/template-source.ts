import path from "node:path";
import fs from "fs-extra";
import { SourceUnavailableError, TemplateError } from "./errors.js";

/** Files ending in this suffix are rendered, then written without it. */
export const TEMPLATE_SUFFIX = ".ejs";

/** Build caches that must never end up in a generated project. */
export const DEFAULT_SKIP_NAMES = [
	"__pycache__",
	".pytest_cache",
	".mypy_cache",
	".ruff_cache",
];

export type EntryKind = "directory" | "static" | "template";

/**
 * `default` is the bundled template and `custom` the user's template folder.
 * A missing default is a packaging defect, not a user error.
 */
export type SourceOrigin = "default" | "custom";

export interface TemplateEntry {
	kind: EntryKind;
	/** Path inside the source root, `/`-separated. */
	relativePath: string;
	/** Path inside the project, `/`-separated, suffix stripped for templates. */
	destination: string;
}

export interface TemplateSource {
	root: string;
	origin: SourceOrigin;
	entries: TemplateEntry[];
}

export interface LoadSourceOptions {
	origin: SourceOrigin;
	skipNames?: readonly string[];
}

export function classifyEntry(
	name: string,
	isDirectory: boolean,
): { kind: EntryKind; destinationName: string } {
	if (isDirectory) {
		return { kind: "directory", destinationName: name };
	}
	if (name.endsWith(TEMPLATE_SUFFIX) && name.length > TEMPLATE_SUFFIX.length) {
		return {
			kind: "template",
			destinationName: name.slice(0, -TEMPLATE_SUFFIX.length),
		};
	}
	return { kind: "static", destinationName: name };
}

async function assertReadableDir(
	root: string,
	origin: SourceOrigin,
): Promise<void> {
	try {
		const stat = await fs.stat(root);
		if (!stat.isDirectory()) {
			throw new Error(`${root} is not a directory`);
		}
		await fs.access(root, fs.constants.R_OK);
	} catch (error) {
		if (origin === "custom") {
			throw new SourceUnavailableError(root, error);
		}
		throw new TemplateError(
			`Bundled template folder is missing: ${root}`,
			root,
			error,
		);
	}
}

async function walk(
	dir: string,
	relativeDir: string,
	destinationDir: string,
	skip: ReadonlySet<string>,
	entries: TemplateEntry[],
): Promise<void> {
	const dirents = await fs.readdir(dir, { withFileTypes: true });
	dirents.sort((a, b) =>
		a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
	);

	for (const dirent of dirents) {
		if (skip.has(dirent.name)) continue;

		const { kind, destinationName } = classifyEntry(
			dirent.name,
			dirent.isDirectory(),
		);
		const relativePath = relativeDir
			? `${relativeDir}/${dirent.name}`
			: dirent.name;
		const destination = destinationDir
			? `${destinationDir}/${destinationName}`
			: destinationName;

		entries.push({ kind, relativePath, destination });

		if (kind === "directory") {
			const next = path.join(dir, dirent.name);
			await walk(next, relativePath, destination, skip, entries);
		}
	}
}

/**
 * Enumerate a template folder depth-first, names sorted within each folder,
 * so every directory is listed before anything inside it.
 */
export async function loadTemplateSource(
	root: string,
	options: LoadSourceOptions,
): Promise<TemplateSource> {
	const resolvedRoot = path.resolve(root);
	await assertReadableDir(resolvedRoot, options.origin);

	const entries: TemplateEntry[] = [];
	try {
		const skip = new Set(options.skipNames ?? []);
		await walk(resolvedRoot, "", "", skip, entries);
	} catch (error) {
		if (options.origin === "custom") {
			throw new SourceUnavailableError(resolvedRoot, error);
		}
		throw new TemplateError(
			`Failed to read bundled template folder ${resolvedRoot}`,
			resolvedRoot,
			error,
		);
	}

	return { root: resolvedRoot, origin: options.origin, entries };
}
