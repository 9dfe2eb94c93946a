import path from "node:path";
import ejs from "ejs";
import fs from "fs-extra";
import { TemplateError, errorMessage, isErrnoException } from "./errors.js";

/**
 * Double-quoted literal that TOML, YAML and Python all accept, so values such
 * as descriptions can't break the descriptor files they land in.
 */
export function quote(text: string): string {
	return JSON.stringify(text);
}

/** Body text for a Python `"""` docstring: backslashes and quotes escaped. */
export function docstring(text: string): string {
	return text.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export async function renderTemplate(
	root: string,
	relativePath: string,
	data: Record<string, unknown>,
): Promise<string> {
	const resolvedRoot = path.resolve(root);
	const fullPath = path.resolve(resolvedRoot, relativePath);

	if (!fullPath.startsWith(resolvedRoot + path.sep)) {
		throw new TemplateError(
			`Invalid template path: "${relativePath}" ` +
				`resolves outside ${resolvedRoot}`,
			relativePath,
		);
	}

	let template: string;
	try {
		template = await fs.readFile(fullPath, "utf8");
	} catch (error) {
		if (isErrnoException(error) && error.code === "ENOENT") {
			throw new TemplateError(
				`Template not found: "${relativePath}"`,
				relativePath,
				error,
			);
		}
		throw new TemplateError(
			`Failed to read template "${relativePath}": ${errorMessage(error)}`,
			relativePath,
			error,
		);
	}

	try {
		return ejs.render(template, data, { filename: fullPath, async: false });
	} catch (error) {
		throw new TemplateError(
			`Failed to render template "${relativePath}": ${errorMessage(error)}`,
			relativePath,
			error,
		);
	}
}
