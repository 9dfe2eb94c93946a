import { cancel, confirm, select, text } from "@clack/prompts";
import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	askInstall,
	askPreCommit,
	collectAnswers,
	defaultAnswers,
} from "./prompts.js";
import { UserAbortError } from "./scaffold/errors.js";
import type { Settings } from "./settings.js";
import { existsOnPypi } from "./utils/pypi.js";

vi.mock("@clack/prompts", () => ({
	cancel: vi.fn(),
	confirm: vi.fn(),
	isCancel: vi.fn((value: unknown) => typeof value === "symbol"),
	log: { warn: vi.fn() },
	note: vi.fn(),
	select: vi.fn(),
	text: vi.fn(),
}));

vi.mock("./utils/pypi.js", () => ({
	existsOnPypi: vi.fn(),
}));

const mockText = vi.mocked(text);
const mockConfirm = vi.mocked(confirm);
const mockSelect = vi.mocked(select);
const mockExistsOnPypi = vi.mocked(existsOnPypi);

const settings: Settings = {
	authorName: "Test Author",
	authorEmail: "author@example.com",
	defaultLicense: "BSD3",
	templateFolder: "",
	useDefaultTemplate: true,
};

const cancelled = Symbol("clack:cancel");

describe("defaultAnswers", () => {
	it("derives the names from the folder and the rest from settings", () => {
		expect(defaultAnswers("my-cool-app", settings)).toEqual({
			name: "My Cool App",
			packageName: "my_cool_app",
			description: "",
			author: "Test Author",
			email: "author@example.com",
			homepage: "",
			repository: "",
			license: "BSD3",
			standalone: false,
		});
	});
});

describe("collectAnswers", () => {
	beforeEach(() => {
		vi.clearAllMocks();
		mockExistsOnPypi.mockResolvedValue(false);
	});

	it("collects every value for a package project", async () => {
		mockText
			.mockResolvedValueOnce("My Tool")
			.mockResolvedValueOnce("my_tool")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("https://example.com/my_tool")
			.mockResolvedValueOnce("A tool")
			.mockResolvedValueOnce("Test Author")
			.mockResolvedValueOnce("author@example.com");
		mockSelect.mockResolvedValueOnce("ISC");
		mockConfirm.mockResolvedValueOnce(true);

		expect(await collectAnswers("my-tool", settings)).toEqual({
			name: "My Tool",
			packageName: "my_tool",
			description: "A tool",
			author: "Test Author",
			email: "author@example.com",
			homepage: "",
			repository: "https://example.com/my_tool",
			license: "ISC",
			standalone: false,
		});
		expect(mockText).toHaveBeenNthCalledWith(
			1,
			expect.objectContaining({
				message: "Name of the Application?",
				defaultValue: "My Tool",
			}),
		);
		expect(mockExistsOnPypi).toHaveBeenCalledWith("my_tool");
	});

	it("skips the URLs and the PyPI lookup for a standalone script", async () => {
		mockText
			.mockResolvedValueOnce("My Script")
			.mockResolvedValueOnce("-")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("Test Author")
			.mockResolvedValueOnce("");
		mockSelect.mockResolvedValueOnce("None");
		mockConfirm.mockResolvedValueOnce(true);

		const answers = await collectAnswers("my-script", settings);

		expect(answers.standalone).toBe(true);
		expect(answers.homepage).toBe("");
		expect(answers.repository).toBe("");
		expect(mockText).toHaveBeenCalledTimes(5);
		expect(mockExistsOnPypi).not.toHaveBeenCalled();
	});

	it("asks again when a taken PyPI name is declined", async () => {
		mockExistsOnPypi.mockResolvedValueOnce(true);
		mockText
			.mockResolvedValueOnce("Requests")
			.mockResolvedValueOnce("requests")
			.mockResolvedValueOnce("my_requests")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("Test Author")
			.mockResolvedValueOnce("");
		mockConfirm.mockResolvedValueOnce(false).mockResolvedValueOnce(true);
		mockSelect.mockResolvedValueOnce("MIT");

		const answers = await collectAnswers("requests", settings);

		expect(answers.packageName).toBe("my_requests");
		expect(mockExistsOnPypi.mock.calls).toEqual([["requests"], ["my_requests"]]);
	});

	it("aborts when the summary is declined", async () => {
		mockText
			.mockResolvedValueOnce("My Script")
			.mockResolvedValueOnce("-")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("")
			.mockResolvedValueOnce("");
		mockSelect.mockResolvedValueOnce("None");
		mockConfirm.mockResolvedValueOnce(false);

		await expect(collectAnswers("my-script", settings)).rejects.toThrow(
			UserAbortError,
		);
	});

	it("aborts on cancel without printing its own message", async () => {
		mockText.mockResolvedValueOnce(cancelled);

		await expect(collectAnswers("my-tool", settings)).rejects.toThrow("Aborting!");
		expect(cancel).not.toHaveBeenCalled();
		expect(mockText).toHaveBeenCalledTimes(1);
	});
});

describe("yes/no questions", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	it("returns the install answer", async () => {
		mockConfirm.mockResolvedValueOnce(false);
		expect(await askInstall()).toBe(false);
	});

	it("asks about the pre-commit hooks", async () => {
		mockConfirm.mockResolvedValueOnce(true);

		expect(await askPreCommit()).toBe(true);
		expect(mockConfirm).toHaveBeenCalledWith({
			message: "Do you want to install and update the pre-commit hooks?",
			initialValue: true,
		});
	});

	it("aborts when the pre-commit question is cancelled", async () => {
		mockConfirm.mockResolvedValueOnce(cancelled);
		await expect(askPreCommit()).rejects.toThrow(UserAbortError);
	});
});
