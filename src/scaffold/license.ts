import path from "node:path";
import fs from "fs-extra";
import { FileSystemError, TemplateError, errorMessage } from "./errors.js";
import { licensesDir } from "./paths.js";
import { renderTemplate } from "./render.js";
import { isLicenseName } from "./values.js";

export const LICENSE_FILE = "LICENSE.txt";

export interface EmitLicenseOptions {
	license: string;
	author: string;
	year: number;
	/** Project root the license file is written into. */
	destination: string;
	licensesDir?: string;
}

/** Render `licenses/<license>.ejs` into `LICENSE.txt` and return its path. */
export async function emitLicense(
	options: EmitLicenseOptions,
): Promise<string> {
	if (!isLicenseName(options.license)) {
		throw new TemplateError(
			`Unknown license "${options.license}"`,
			`${options.license}.ejs`,
		);
	}

	const content = await renderTemplate(
		options.licensesDir ?? licensesDir(),
		`${options.license}.ejs`,
		{ author: options.author, year: options.year },
	);

	const target = path.join(options.destination, LICENSE_FILE);
	try {
		await fs.writeFile(target, content, "utf8");
	} catch (error) {
		throw new FileSystemError(
			`Failed to write ${LICENSE_FILE}: ${errorMessage(error)}`,
			target,
			error,
		);
	}
	return target;
}
