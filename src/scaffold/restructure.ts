import path from "node:path";
import fs from "fs-extra";
import { FileSystemError, StructureError, errorMessage } from "./errors.js";
import type { PackagingMode } from "./values.js";

/** Application folder every template ships, renamed or dissolved afterwards. */
export const PLACEHOLDER_PACKAGE = "app";
export const ENTRY_POINT = "main.py";
export const TESTS_DIR = "tests";

async function osStep(
	description: string,
	target: string,
	step: () => Promise<void>,
) {
	try {
		await step();
	} catch (error) {
		throw new FileSystemError(
			`Failed to ${description}: ${errorMessage(error)}`,
			target,
			error,
		);
	}
}

/**
 * Turn the placeholder `app/` folder into the final package, or hoist its
 * entry point to the root for a standalone script. Drops `tests/` unless kept.
 */
export async function restructureProject(
	projectDir: string,
	mode: PackagingMode,
	keepTests: boolean,
): Promise<void> {
	const placeholder = path.join(projectDir, PLACEHOLDER_PACKAGE);

	switch (mode.kind) {
		case "package": {
			if (!(await fs.pathExists(placeholder))) {
				throw new StructureError(
					`Template did not produce the '${PLACEHOLDER_PACKAGE}' folder`,
					placeholder,
				);
			}
			const packageDir = path.join(projectDir, mode.packageName);
			if (packageDir !== placeholder) {
				await osStep(
					`rename ${PLACEHOLDER_PACKAGE} to ${mode.packageName}`,
					packageDir,
					() => fs.rename(placeholder, packageDir),
				);
			}
			break;
		}
		case "standalone": {
			const entryPoint = path.join(placeholder, ENTRY_POINT);
			if (!(await fs.pathExists(entryPoint))) {
				throw new StructureError(
					`Template did not produce '${PLACEHOLDER_PACKAGE}/${ENTRY_POINT}'`,
					entryPoint,
				);
			}
			const hoisted = path.join(projectDir, ENTRY_POINT);
			await osStep(`move ${ENTRY_POINT} to the project root`, hoisted, () =>
				fs.rename(entryPoint, hoisted),
			);
			await osStep(`remove ${PLACEHOLDER_PACKAGE}`, placeholder, () =>
				fs.remove(placeholder),
			);
			break;
		}
	}

	if (!keepTests) {
		const testsDir = path.join(projectDir, TESTS_DIR);
		await osStep(`remove ${TESTS_DIR}`, testsDir, () => fs.remove(testsDir));
	}
}
