import { confirm, isCancel, log, note, select, text } from "@clack/prompts";
import pc from "picocolors";
import { UserAbortError } from "./scaffold/errors.js";
import {
	LICENSE_CHOICES,
	type LicenseChoice,
	type ProjectAnswers,
	STANDALONE_PACKAGE,
	isValidPackageName,
	sanitizePackageName,
	toTitle,
} from "./scaffold/values.js";
import type { Settings } from "./settings.js";
import { existsOnPypi } from "./utils/pypi.js";

const PACKAGE_NAME_QUESTION =
	`Package Name? (Use '${STANDALONE_PACKAGE}' for standalone script)`;

const INVALID_PACKAGE_NAME =
	"Package name cannot contain dashes, dots or spaces. " +
	"Please use underscores if required.";

function bailIfCancelled<T>(value: T): asserts value is Exclude<T, symbol> {
	if (isCancel(value)) {
		throw new UserAbortError();
	}
}

/** Answers for `--yes`, taken from the folder name and the settings. */
export function defaultAnswers(
	folderName: string,
	settings: Settings,
): ProjectAnswers {
	return {
		name: toTitle(folderName),
		packageName: sanitizePackageName(folderName),
		description: "",
		author: settings.authorName,
		email: settings.authorEmail,
		homepage: "",
		repository: "",
		license: settings.defaultLicense,
		standalone: false,
	};
}

async function askText(message: string, defaultValue = ""): Promise<string> {
	const value = await text({
		message,
		defaultValue,
		placeholder: defaultValue || undefined,
	});
	bailIfCancelled(value);
	return value;
}

async function askPackageName(suggested: string): Promise<string> {
	for (;;) {
		const name = await text({
			message: PACKAGE_NAME_QUESTION,
			defaultValue: suggested,
			placeholder: suggested,
			validate: (value) =>
				value !== "" && !isValidPackageName(value)
					? INVALID_PACKAGE_NAME
					: undefined,
		});
		bailIfCancelled(name);

		if (name === STANDALONE_PACKAGE || !(await existsOnPypi(name))) {
			return name;
		}

		log.warn("Package name already exists on PyPI.");
		const useAnyway = await confirm({
			message: "Do you want to use it anyway?",
			initialValue: false,
		});
		bailIfCancelled(useAnyway);
		if (useAnyway) {
			const blocked = pc.bold("cannot be uploaded to PyPI");
			log.warn(`Using an existing package name means it ${blocked}.`);
			return name;
		}
	}
}

async function confirmAnswers(answers: ProjectAnswers): Promise<boolean> {
	const rows = Object.entries(answers);
	const padding = Math.max(...rows.map(([key]) => toTitle(key).length)) + 1;
	const summary = rows.map(
		([key, value]) =>
			`${toTitle(key).padStart(padding)} : ${pc.green(String(value))}`,
	);
	note(summary.join("\n"), "Creating a new Python app with these settings");

	const ok = await confirm({ message: "Is this correct?", initialValue: true });
	bailIfCancelled(ok);
	return ok;
}

/**
 * Ask for every value the templates need. Declining the final summary
 * aborts before anything is written.
 */
export async function collectAnswers(
	folderName: string,
	settings: Settings,
): Promise<ProjectAnswers> {
	const name = await askText("Name of the Application?", toTitle(folderName));
	const packageName = await askPackageName(sanitizePackageName(folderName));
	const standalone = packageName === STANDALONE_PACKAGE;

	let homepage = "";
	let repository = "";
	if (!standalone) {
		homepage = await askText("Homepage URL?");
		repository = await askText(
			"Repository URL?",
			`https://github.com/your_user_name/${packageName}`,
		);
	}

	const description = await askText("Description of the Application?");
	const author = await askText("Author Name?", settings.authorName);
	const email = await askText("Author Email?", settings.authorEmail);

	const license = await select<LicenseChoice>({
		message: "Application License?",
		options: LICENSE_CHOICES.map((choice) => ({
			value: choice,
			label: choice,
		})),
		initialValue: settings.defaultLicense,
	});
	bailIfCancelled(license);

	const answers: ProjectAnswers = {
		name,
		packageName,
		description,
		author,
		email,
		homepage,
		repository,
		license,
		standalone,
	};

	if (!(await confirmAnswers(answers))) {
		throw new UserAbortError();
	}
	return answers;
}

export async function askInstall(): Promise<boolean> {
	const install = await confirm({
		message: "Should I run 'poetry install' now?",
		initialValue: true,
	});
	bailIfCancelled(install);
	return install;
}

export async function askPreCommit(): Promise<boolean> {
	const preCommit = await confirm({
		message: "Do you want to install and update the pre-commit hooks?",
		initialValue: true,
	});
	bailIfCancelled(preCommit);
	return preCommit;
}
