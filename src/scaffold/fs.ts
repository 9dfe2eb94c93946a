import path from "node:path";
import fs from "fs-extra";
import {
	DirectoryExistsError,
	FileSystemError,
	PermissionDeniedError,
	TargetNotEmptyError,
	errorMessage,
	isErrnoException,
} from "./errors.js";

export type TargetState = "missing" | "empty";

/**
 * Check the target can receive a new project: it must be missing or an empty
 * directory, and whichever folder we will write into must be writable.
 */
export async function assertTargetAvailable(dir: string): Promise<TargetState> {
	let state: TargetState = "missing";

	if (await fs.pathExists(dir)) {
		const stat = await fs.stat(dir);
		if (!stat.isDirectory()) {
			throw new DirectoryExistsError(dir);
		}
		const entries = await fs.readdir(dir);
		if (entries.length > 0) {
			throw new TargetNotEmptyError(dir);
		}
		state = "empty";
	}

	const writableDir = state === "empty" ? dir : path.dirname(dir);
	try {
		await fs.access(writableDir, fs.constants.W_OK);
	} catch (error) {
		throw new PermissionDeniedError(dir, error);
	}

	return state;
}

/** Create the project root. Nothing to do when it already exists empty. */
export async function createProjectRoot(
	dir: string,
	state: TargetState,
): Promise<void> {
	if (state === "empty") return;

	try {
		await fs.mkdir(dir);
	} catch (error) {
		if (isErrnoException(error)) {
			if (error.code === "EEXIST") throw new DirectoryExistsError(dir, error);
			if (error.code === "EACCES" || error.code === "EPERM") {
				throw new PermissionDeniedError(dir, error);
			}
		}
		throw new FileSystemError(
			`Failed to create '${dir}': ${errorMessage(error)}`,
			dir,
			error,
		);
	}
}
