import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { CommanderError } from "commander";
import { createProgram, type CommandHandlers } from "../../../src/cli/program.js";
import { resolveConfig } from "../../../src/config/index.js";
import type { FetchOptions } from "../../../src/commands/fetch.js";
import type { TranslateOptions } from "../../../src/commands/translate.js";
import type { ReviewOptions } from "../../../src/commands/review.js";
import type { ValidateOptions } from "../../../src/commands/validate.js";
import ErrorHelper, { ToolError } from "../../../src/utils/error-helper.js";

const createFakeHandlers = () =>
	({
		fetch: vi.fn<(options: FetchOptions) => Promise<void>>().mockResolvedValue(undefined),
		translate: vi.fn<(options: TranslateOptions) => Promise<void>>().mockResolvedValue(undefined),
		update: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
		review: vi.fn<(options: ReviewOptions) => Promise<void>>().mockResolvedValue(undefined),
		validate: vi.fn<(options: ValidateOptions) => Promise<boolean>>().mockResolvedValue(true),
	}) satisfies CommandHandlers;

describe("createProgram", () => {
	let handlers: ReturnType<typeof createFakeHandlers>;
	let exit: Mock<(code: number) => void>;
	let savedDebug: string | undefined;

	const run = async (...args: string[]) => {
		const program = createProgram(resolveConfig(), { handlers, exit });
		program.exitOverride();
		program.commands.forEach((command) => {
			command.exitOverride().configureOutput({ writeErr: () => {} });
		});
		await program.parseAsync(["node", "locsync", ...args]);
	};

	beforeEach(() => {
		handlers = createFakeHandlers();
		exit = vi.fn<(code: number) => void>();
		savedDebug = process.env.DEBUG;
		delete process.env.DEBUG;
	});

	afterEach(() => {
		vi.restoreAllMocks();
		if (savedDebug === undefined) delete process.env.DEBUG;
		else process.env.DEBUG = savedDebug;
	});

	it("should pass translate options with the configured worker default", async () => {
		await run("translate");

		expect(handlers.translate).toHaveBeenCalledWith({
			mode: "untranslated",
			update: false,
			force: false,
			workers: 4,
		});
		expect(exit).not.toHaveBeenCalled();
	});

	it("should parse translate flags", async () => {
		await run("translate", "--mode", "unreviewed", "--update", "--workers", "8");

		expect(handlers.translate).toHaveBeenCalledWith({
			mode: "unreviewed",
			update: true,
			force: false,
			workers: 8,
		});
	});

	it("should parse fetch flags", async () => {
		await run("fetch", "--mode", "all", "--async");

		expect(handlers.fetch).toHaveBeenCalledWith({ mode: "all", force: false, async: true });
	});

	it("should run update without options", async () => {
		await run("update");

		expect(handlers.update).toHaveBeenCalledTimes(1);
	});

	it("should normalize the review language", async () => {
		await run("review", "--language", "pt-br", "--approve-all", "--update");

		expect(handlers.review).toHaveBeenCalledWith({
			language: "pt-BR",
			update: true,
			force: false,
			approveAll: true,
			workers: 4,
		});
	});

	it("should leave the review language out when not given", async () => {
		await run("review");

		expect(handlers.review).toHaveBeenCalledWith({
			update: false,
			force: false,
			approveAll: false,
			workers: 4,
		});
	});

	it("should validate the translations directory by default", async () => {
		await run("validate");

		expect(handlers.validate).toHaveBeenCalledWith({ directory: "translations", format: "all" });
		expect(exit).not.toHaveBeenCalled();
	});

	it("should exit with 1 when validation finds invalid files", async () => {
		handlers.validate.mockResolvedValue(false);

		await run("validate", "--format", "po");

		expect(handlers.validate).toHaveBeenCalledWith({ directory: "translations", format: "po" });
		expect(exit).toHaveBeenCalledWith(1);
	});

	it("should report a failed command and exit with 1", async () => {
		const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
		const error = new ToolError("bad config", "ERR_CONFIG_VALIDATION");
		handlers.translate.mockRejectedValue(error);

		await run("translate");

		expect(errorSpy).toHaveBeenCalledWith(ErrorHelper.formatError(error));
		expect(exit).toHaveBeenCalledWith(1);
	});

	it("should reject an invalid worker count before running the command", async () => {
		const failure = run("translate", "--workers", "0");

		await expect(failure).rejects.toBeInstanceOf(CommanderError);
		await expect(failure).rejects.toHaveProperty("code", "commander.invalidArgument");
		expect(handlers.translate).not.toHaveBeenCalled();
	});

	it("should reject an unknown mode", async () => {
		await expect(run("fetch", "--mode", "everything")).rejects.toHaveProperty(
			"code",
			"commander.invalidArgument"
		);
		expect(handlers.fetch).not.toHaveBeenCalled();
	});

	it("should turn on debug mode from the global flag", async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});

		await run("--debug", "update");

		expect(process.env.DEBUG).toBe("true");
		expect(handlers.update).toHaveBeenCalledTimes(1);
	});
});
