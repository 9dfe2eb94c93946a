import nodeFs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/**
 * Locate the package root (the folder holding `templates/`).
 *
 * Walks upward because this module runs from `src/scaffold` under the tests
 * and from `dist/scaffold` once built.
 */
export function packageRoot(): string {
	let dir = moduleDir;

	for (let i = 0; i < 6; i++) {
		if (nodeFs.existsSync(path.join(dir, "templates"))) return dir;
		dir = path.dirname(dir);
	}

	throw new Error(
		`Could not locate templates/. Searched upwards from: ${moduleDir}`,
	);
}

export function templatesDir(): string {
	return path.join(packageRoot(), "templates");
}

export function templatePath(...parts: string[]): string {
	return path.resolve(templatesDir(), ...parts);
}

/** Root of the built-in project template. */
export function defaultTemplateDir(): string {
	return templatePath("project");
}

export function licensesDir(): string {
	return templatePath("licenses");
}
