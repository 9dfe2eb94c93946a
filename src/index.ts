#!/usr/bin/env node
import process from "node:process";
import { cancel } from "@clack/prompts";
import pc from "picocolors";
import { createProgram } from "./cli.js";
import { ScaffoldError, UserAbortError } from "./scaffold/errors.js";

try {
	await createProgram().parseAsync(process.argv);
} catch (error) {
	if (error instanceof UserAbortError) {
		cancel(error.message);
		process.exitCode = error.exitCode;
	} else if (error instanceof ScaffoldError) {
		console.error(pc.red(`  -> Error: ${error.message}`));
		process.exitCode = error.exitCode;
	} else {
		throw error;
	}
}
