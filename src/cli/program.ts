import { Command, InvalidArgumentError, Option, type OptionValues } from "commander";
import type { ResolvedConfig } from "../config/index.js";
import { createContext, reportCommandError } from "./helpers.js";
import FetchCommand, { type FetchOptions } from "../commands/fetch.js";
import TranslateCommand, { type TranslateOptions } from "../commands/translate.js";
import UpdateCommand from "../commands/update.js";
import ReviewCommand, { type ReviewOptions } from "../commands/review.js";
import ValidateCommand, { type ValidateOptions } from "../commands/validate.js";
import { VALIDATION_FORMATS } from "../services/validation-service.js";
import InputValidator from "../utils/input-validator.js";
import ErrorHelper from "../utils/error-helper.js";
import { getLogger } from "../utils/logger.js";
import type { FetchMode, StringMode } from "../types/index.js";

const FETCH_MODES: readonly FetchMode[] = ["untranslated", "unreviewed", "all"];
const STRING_MODES: readonly StringMode[] = ["untranslated", "unreviewed"];

export interface CommandHandlers {
	fetch(options: FetchOptions): Promise<void>;
	translate(options: TranslateOptions): Promise<void>;
	update(): Promise<void>;
	review(options: ReviewOptions): Promise<void>;
	/** Resolves to false when any file is invalid */
	validate(options: ValidateOptions): Promise<boolean>;
}

export interface ProgramOptions {
	version?: string;
	handlers?: CommandHandlers;
	exit?: (code: number) => void;
}

/**
 * Handlers that run the real commands against Transifex and the configured provider.
 */
export const createHandlers = (config: ResolvedConfig): CommandHandlers => ({
	fetch: async (options) => {
		await new FetchCommand(createContext(config)).run(options);
	},
	translate: async (options) => {
		await new TranslateCommand(createContext(config)).run(options);
	},
	update: async () => {
		await new UpdateCommand(createContext(config)).run();
	},
	review: async (options) => {
		await new ReviewCommand(createContext(config)).run(options);
	},
	validate: async (options) => {
		const report = await new ValidateCommand().run(options);
		return report.invalidFiles.length === 0;
	},
});

const parseWorkers = (value: string): number => {
	try {
		return InputValidator.validateWorkerCount(value);
	} catch (error) {
		throw new InvalidArgumentError(ErrorHelper.getMessage(error));
	}
};

const parseLanguage = (value: string): string => {
	try {
		return InputValidator.validateLanguageCode(value);
	} catch (error) {
		throw new InvalidArgumentError(ErrorHelper.getMessage(error));
	}
};

const workersOf = (options: OptionValues, fallback: number): number =>
	typeof options.workers === "number" ? options.workers : fallback;

export function createProgram(config: ResolvedConfig, options: ProgramOptions = {}): Command {
	const handlers = options.handlers ?? createHandlers(config);
	const exit = options.exit ?? ((code: number) => process.exit(code));
	const program = new Command();

	const run = async (action: () => Promise<boolean | void>): Promise<void> => {
		try {
			if ((await action()) === false) exit(1);
		} catch (error) {
			reportCommandError(error);
			exit(1);
		}
	};

	program
		.name("locsync")
		.description("Translate and review Transifex strings with a language model")
		.version(options.version ?? "0.0.0")
		.option("--debug", "Enable debug mode with verbose logging", false)
		.option("--verbose", "Enable detailed diagnostic output", false);

	program.on("option:debug", () => {
		process.env.DEBUG = "true";
		getLogger({ ...config.logging, verbose: true });
	});

	program.on("option:verbose", () => {
		process.env.VERBOSE = "true";
		getLogger({ ...config.logging, verbose: true });
	});

	program
		.command("fetch")
		.description("Fetch strings from Transifex")
		.addOption(
			new Option("--mode <mode>", "Type of strings to fetch").choices(FETCH_MODES).default("untranslated")
		)
		.option("--force", "Force download even if cache exists", false)
		.option("--async", "Download translated files through async export jobs", false)
		.action(async (opts: OptionValues) => {
			await run(() =>
				handlers.fetch({
					mode: InputValidator.validateMode(String(opts.mode), FETCH_MODES),
					force: opts.force === true,
					async: opts.async === true,
				})
			);
		});

	program
		.command("translate")
		.description("Translate untranslated strings or review unreviewed ones")
		.addOption(
			new Option("--mode <mode>", "Type of strings to translate").choices(STRING_MODES).default("untranslated")
		)
		.option("--update", "Update translations in Transifex", false)
		.option("--force", "Force download even if cache exists", false)
		.option("--workers <n>", "Number of concurrent model calls", parseWorkers, config.workers)
		.action(async (opts: OptionValues) => {
			await run(() =>
				handlers.translate({
					mode: InputValidator.validateMode(String(opts.mode), STRING_MODES),
					update: opts.update === true,
					force: opts.force === true,
					workers: workersOf(opts, config.workers),
				})
			);
		});

	program
		.command("update")
		.description("Update Transifex from saved translations")
		.action(async () => {
			await run(() => handlers.update());
		});

	program
		.command("review")
		.description("Review unreviewed translations using a language model")
		.option("--language <code>", "Language to review (default: every cached language)", parseLanguage)
		.option("--update", "Mark approved translations as reviewed in Transifex", false)
		.option("--force", "Force fetch new unreviewed strings before review", false)
		.option("--approve-all", "Approve all updates without asking", false)
		.option("--workers <n>", "Number of concurrent reviews", parseWorkers, config.workers)
		.action(async (opts: OptionValues) => {
			await run(() =>
				handlers.review({
					...(typeof opts.language === "string" ? { language: opts.language } : {}),
					update: opts.update === true,
					force: opts.force === true,
					approveAll: opts.approveAll === true,
					workers: workersOf(opts, config.workers),
				})
			);
		});

	program
		.command("validate")
		.description("Validate placeholders in translation files")
		.option("--directory <dir>", "Directory containing translation files", config.directories.translations)
		.addOption(
			new Option("--format <format>", "File format to validate").choices(VALIDATION_FORMATS).default("all")
		)
		.action(async (opts: OptionValues) => {
			await run(() =>
				handlers.validate({
					directory: InputValidator.validateDirectoryPath(String(opts.directory)),
					format: InputValidator.validateMode(String(opts.format), VALIDATION_FORMATS, "format"),
				})
			);
		});

	return program;
}
