import { execa } from "execa";
import { CommandError, errorMessage } from "./errors.js";

/**
 * Run a system command in a specific working directory, streaming output to
 * the terminal. A non-zero exit is fatal.
 */
export async function runCommand(
	cwd: string,
	cmd: string,
	args: string[],
): Promise<void> {
	try {
		await execa(cmd, args, { cwd, stdio: "inherit" });
	} catch (error) {
		const command = [cmd, ...args].join(" ");
		throw new CommandError(command, errorMessage(error), error);
	}
}
