import { execa } from "execa";
import { GitError, errorMessage } from "./errors.js";

export const INITIAL_COMMIT_MESSAGE = "Initial Commit";

/** Create a repository in `dir` and commit everything in it. */
export async function createGitRepo(dir: string): Promise<void> {
	try {
		await execa("git", ["init"], { cwd: dir });
		await execa("git", ["add", "--all"], { cwd: dir });
		await execa("git", ["commit", "--message", INITIAL_COMMIT_MESSAGE], {
			cwd: dir,
		});
	} catch (error) {
		throw new GitError(errorMessage(error), error);
	}
}
