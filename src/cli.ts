import path from "node:path";
import { Command } from "commander";
import fs from "fs-extra";
import { z } from "zod";
import { registerConfigCommand } from "./commands/config.js";
import { registerNewCommand } from "./commands/new.js";
import { packageRoot } from "./scaffold/paths.js";

const packageJsonSchema = z.object({ name: z.string(), version: z.string() });

export function readPackageJson(): z.infer<typeof packageJsonSchema> {
	const file = path.join(packageRoot(), "package.json");
	return packageJsonSchema.parse(fs.readJsonSync(file));
}

export function createProgram(): Command {
	const { name, version } = readPackageJson();
	const program = new Command();

	program
		.name(name)
		.description("Create a new Python project from templates")
		.version(version);

	registerNewCommand(program);
	registerConfigCommand(program);

	return program;
}
