import os from "node:os";
import path from "node:path";
import fs from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { askInstall, askPreCommit, collectAnswers } from "../prompts.js";
import { LocationError, TargetNotEmptyError } from "../scaffold/errors.js";
import { postCreate } from "../scaffold/post-create.js";
import type { ProjectAnswers } from "../scaffold/values.js";
import { type NewCommandOptions, runNew } from "./new.js";

vi.mock("@clack/prompts", () => ({
	cancel: vi.fn(),
	confirm: vi.fn(),
	intro: vi.fn(),
	isCancel: vi.fn(() => false),
	log: { info: vi.fn(), message: vi.fn(), step: vi.fn(), warn: vi.fn() },
	note: vi.fn(),
	outro: vi.fn(),
	select: vi.fn(),
	spinner: vi.fn(() => ({ start: vi.fn(), stop: vi.fn(), message: vi.fn() })),
	text: vi.fn(),
}));

vi.mock("../prompts.js", async (importOriginal) => ({
	...(await importOriginal<typeof import("../prompts.js")>()),
	askInstall: vi.fn(),
	askPreCommit: vi.fn(),
	collectAnswers: vi.fn(),
}));

vi.mock("../scaffold/post-create.js", () => ({
	postCreate: vi.fn(),
}));

const mockCollectAnswers = vi.mocked(collectAnswers);
const mockAskInstall = vi.mocked(askInstall);
const mockAskPreCommit = vi.mocked(askPreCommit);
const mockPostCreate = vi.mocked(postCreate);

const defaults: NewCommandOptions = {
	test: true,
	git: true,
	install: true,
	preCommit: true,
};

const answers: ProjectAnswers = {
	name: "My Tool",
	packageName: "my_tool",
	description: "",
	author: "Test Author",
	email: "",
	homepage: "",
	repository: "",
	license: "None",
	standalone: false,
};

describe("runNew", () => {
	let cwd: string;
	let configDir: string;
	const previous = process.env.CREATE_PY_APP_CONFIG_PATH;

	beforeEach(async () => {
		vi.clearAllMocks();
		cwd = await fs.mkdtemp(path.join(os.tmpdir(), "create-py-app-new-"));
		configDir = await fs.mkdtemp(path.join(os.tmpdir(), "create-py-app-new-config-"));
		process.env.CREATE_PY_APP_CONFIG_PATH = configDir;
	});

	afterEach(async () => {
		if (previous === undefined) {
			delete process.env.CREATE_PY_APP_CONFIG_PATH;
		} else {
			process.env.CREATE_PY_APP_CONFIG_PATH = previous;
		}
		await fs.remove(cwd);
		await fs.remove(configDir);
	});

	it("rejects a bad location before asking anything", async () => {
		await expect(runNew("a/b", defaults, cwd)).rejects.toThrow(LocationError);
		expect(mockCollectAnswers).not.toHaveBeenCalled();
	});

	it("rejects a non-empty target before asking anything", async () => {
		await fs.outputFile(path.join(cwd, "taken", "keep.txt"), "keep");

		await expect(runNew("taken", defaults, cwd)).rejects.toThrow(TargetNotEmptyError);
		expect(mockCollectAnswers).not.toHaveBeenCalled();
	});

	it("accepts every default with --yes", async () => {
		await runNew("my-tool", { ...defaults, yes: true, test: false }, cwd);

		expect(mockCollectAnswers).not.toHaveBeenCalled();
		expect(mockAskInstall).not.toHaveBeenCalled();
		expect(mockAskPreCommit).not.toHaveBeenCalled();
		expect(await fs.pathExists(path.join(cwd, "my-tool", "my_tool", "main.py"))).toBe(true);
		expect(await fs.pathExists(path.join(cwd, "my-tool", "tests"))).toBe(false);
		expect(mockPostCreate).toHaveBeenCalledWith(
			expect.objectContaining({
				name: "My Tool",
				packageName: "my_tool",
				projectDir: path.join(cwd, "my-tool"),
			}),
			{
				test: false,
				git: true,
				docs: false,
				install: true,
				preCommit: true,
				acceptDefaults: true,
			},
		);
	});

	it("does not offer the hooks when install is declined", async () => {
		mockCollectAnswers.mockResolvedValueOnce(answers);
		mockAskInstall.mockResolvedValueOnce(false);

		await runNew("my-tool", defaults, cwd);

		expect(mockAskPreCommit).not.toHaveBeenCalled();
		expect(mockPostCreate).toHaveBeenCalledWith(
			expect.objectContaining({ projectDir: path.join(cwd, "my-tool") }),
			expect.objectContaining({ install: false, preCommit: false }),
		);
	});

	it("does not offer the hooks with --no-pre-commit", async () => {
		mockCollectAnswers.mockResolvedValueOnce(answers);
		mockAskInstall.mockResolvedValueOnce(true);

		await runNew("my-tool", { ...defaults, preCommit: false }, cwd);

		expect(mockAskPreCommit).not.toHaveBeenCalled();
		expect(mockPostCreate).toHaveBeenCalledWith(
			expect.anything(),
			expect.objectContaining({ install: true, preCommit: false }),
		);
	});

	it("asks about the hooks after an install", async () => {
		mockCollectAnswers.mockResolvedValueOnce(answers);
		mockAskInstall.mockResolvedValueOnce(true);
		mockAskPreCommit.mockResolvedValueOnce(false);

		await runNew("my-tool", defaults, cwd);

		expect(mockAskPreCommit).toHaveBeenCalledTimes(1);
		expect(mockPostCreate).toHaveBeenCalledWith(
			expect.anything(),
			expect.objectContaining({ install: true, preCommit: false }),
		);
	});
});
