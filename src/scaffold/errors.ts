/**
 * Process exit codes. Each failure cause keeps its own code so calling
 * scripts can tell them apart.
 */
export const ExitCode = {
	LOCATION_ERROR: 3,
	DIRECTORY_EXISTS: 4,
	PERMISSION_DENIED: 5,
	FOLDER_NOT_EMPTY: 6,
	OS_ERROR: 7,
	GIT_ERROR: 8,
	USER_ABORT: 9,
	TEMPLATE_ERROR: 10,
	SOURCE_UNAVAILABLE: 11,
	INVALID_VALUES: 12,
	COMMAND_ERROR: 13,
	SETTINGS_ERROR: 14,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class ScaffoldError extends Error {
	constructor(
		message: string,
		public readonly exitCode: ExitCode,
		cause?: unknown,
	) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "ScaffoldError";
	}
}

export class LocationError extends ScaffoldError {
	constructor(public readonly location: string) {
		super(
			"Location must be a single directory name, and is relative to the " +
				`current directory (got "${location}").`,
			ExitCode.LOCATION_ERROR,
		);
		this.name = "LocationError";
	}
}

export class TargetNotEmptyError extends ScaffoldError {
	constructor(public readonly targetDir: string) {
		super(
			`The chosen folder is not empty: ${targetDir}. ` +
				"Please specify a different location.",
			ExitCode.FOLDER_NOT_EMPTY,
		);
		this.name = "TargetNotEmptyError";
	}
}

export class DirectoryExistsError extends ScaffoldError {
	constructor(
		public readonly targetDir: string,
		cause?: unknown,
	) {
		super(
			`Directory '${targetDir}' already exists.`,
			ExitCode.DIRECTORY_EXISTS,
			cause,
		);
		this.name = "DirectoryExistsError";
	}
}

export class PermissionDeniedError extends ScaffoldError {
	constructor(
		public readonly targetDir: string,
		cause?: unknown,
	) {
		super(
			`Permission denied creating directory '${targetDir}'.`,
			ExitCode.PERMISSION_DENIED,
			cause,
		);
		this.name = "PermissionDeniedError";
	}
}

/** An OS-level failure while writing or restructuring the project tree. */
export class FileSystemError extends ScaffoldError {
	constructor(
		message: string,
		public readonly targetPath: string,
		cause?: unknown,
	) {
		super(message, ExitCode.OS_ERROR, cause);
		this.name = "FileSystemError";
	}
}

export class TemplateError extends ScaffoldError {
	constructor(
		message: string,
		public readonly templatePath: string,
		cause?: unknown,
	) {
		super(message, ExitCode.TEMPLATE_ERROR, cause);
		this.name = "TemplateError";
	}
}

/** The generated tree does not have the shape every template must produce. */
export class StructureError extends ScaffoldError {
	constructor(
		message: string,
		public readonly expectedPath: string,
	) {
		super(message, ExitCode.TEMPLATE_ERROR);
		this.name = "StructureError";
	}
}

export class SourceUnavailableError extends ScaffoldError {
	constructor(
		public readonly root: string,
		cause?: unknown,
	) {
		super(
			`Template folder '${root}' does not exist or cannot be read.`,
			ExitCode.SOURCE_UNAVAILABLE,
			cause,
		);
		this.name = "SourceUnavailableError";
	}
}

export class InvalidValuesError extends ScaffoldError {
	constructor(public readonly issues: string[]) {
		super(
			`Invalid project values: ${issues.join("; ")}`,
			ExitCode.INVALID_VALUES,
		);
		this.name = "InvalidValuesError";
	}
}

export class GitError extends ScaffoldError {
	constructor(message: string, cause?: unknown) {
		super(`Git error: ${message}`, ExitCode.GIT_ERROR, cause);
		this.name = "GitError";
	}
}

export class CommandError extends ScaffoldError {
	constructor(
		public readonly command: string,
		message: string,
		cause?: unknown,
	) {
		super(
			`Command '${command}' failed: ${message}`,
			ExitCode.COMMAND_ERROR,
			cause,
		);
		this.name = "CommandError";
	}
}

export class SettingsError extends ScaffoldError {
	constructor(
		message: string,
		public readonly settingsPath: string,
		cause?: unknown,
	) {
		super(message, ExitCode.SETTINGS_ERROR, cause);
		this.name = "SettingsError";
	}
}

export class UserAbortError extends ScaffoldError {
	constructor() {
		super("Aborting!", ExitCode.USER_ABORT);
		this.name = "UserAbortError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(
	error: unknown,
): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}
