import path from "node:path";
import { z } from "zod";
import { InvalidValuesError, LocationError } from "./errors.js";

export const LICENSE_NAMES = [
	"MIT",
	"BSD2",
	"BSD3",
	"ISC",
	"Unlicense",
] as const;
export type LicenseName = (typeof LICENSE_NAMES)[number];

export const NO_LICENSE = "None";
export const LICENSE_CHOICES = [...LICENSE_NAMES, NO_LICENSE] as const;
export type LicenseChoice = (typeof LICENSE_CHOICES)[number];

/** Package name meaning "standalone script, no package folder". */
export const STANDALONE_PACKAGE = "-";

const PACKAGE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const projectAnswersSchema = z
	.object({
		name: z.string().trim().min(1, "name cannot be empty"),
		packageName: z.union([
			z.literal(STANDALONE_PACKAGE),
			z
				.string()
				.regex(
					PACKAGE_NAME_PATTERN,
					"package name cannot contain dashes, dots or spaces; use underscores",
				),
		]),
		description: z.string(),
		author: z.string(),
		email: z.string(),
		homepage: z.string(),
		repository: z.string(),
		license: z.enum(LICENSE_CHOICES),
		standalone: z.boolean(),
	})
	.refine(
		(values) =>
			values.standalone === (values.packageName === STANDALONE_PACKAGE),
		{
			message: "standalone must be set exactly when the package name is '-'",
			path: ["standalone"],
		},
	);

export type ProjectAnswers = z.infer<typeof projectAnswersSchema>;

/** Answers plus the target directory, which only the engine resolves. */
export type ProjectValues = ProjectAnswers & { projectDir: string };

export interface ScaffoldOptions {
	/** Keep the tests folder. */
	test: boolean;
	/** Initialise a git repository with one commit. */
	git: boolean;
	/** Bootstrap MkDocs after installing. */
	docs: boolean;
	/** Run `poetry install` after generation. */
	install: boolean;
	/** Install and update the pre-commit hooks (needs install). */
	preCommit: boolean;
	acceptDefaults: boolean;
}

export type PackagingMode =
	| { kind: "package"; packageName: string }
	| { kind: "standalone" };

export function parseProjectAnswers(input: unknown): ProjectAnswers {
	const result = projectAnswersSchema.safeParse(input);
	if (!result.success) {
		throw new InvalidValuesError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".")}: ${issue.message}`,
			),
		);
	}
	return result.data;
}

export function packagingMode(
	values: Pick<ProjectAnswers, "packageName">,
): PackagingMode {
	return values.packageName === STANDALONE_PACKAGE
		? { kind: "standalone" }
		: { kind: "package", packageName: values.packageName };
}

export function isLicenseName(value: string): value is LicenseName {
	return LICENSE_NAMES.some((name) => name === value);
}

export function isValidPackageName(value: string): boolean {
	return value === STANDALONE_PACKAGE || PACKAGE_NAME_PATTERN.test(value);
}

/**
 * Resolves the target directory for `location`, which must be a single path
 * segment below `cwd` (or `.` for `cwd` itself).
 */
export function resolveProjectDir(location: string, cwd: string): string {
	if (location.trim() === "" || path.isAbsolute(location)) {
		throw new LocationError(location);
	}
	const segments = location
		.split(/[\\/]+/)
		.filter((segment) => segment !== "" && segment !== ".");
	if (segments.length > 1 || segments[0] === "..") {
		throw new LocationError(location);
	}
	return path.resolve(cwd, ...segments);
}

export function sanitizePackageName(text: string): string {
	const name = text
		.trim()
		.toLowerCase()
		.replace(/[-.\s]+/g, "_")
		.replace(/[^a-z0-9_]/g, "");
	return /^[0-9]/.test(name) ? `_${name}` : name;
}

export function toTitle(text: string): string {
	return text
		.split(/[-_\s]+/)
		.filter((word) => word !== "")
		.map((word) => word.charAt(0).toUpperCase() + word.slice(1))
		.join(" ");
}
