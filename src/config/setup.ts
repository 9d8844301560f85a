import dotenv from "dotenv";
import { promises as fs } from "fs";
import path from "path";
import { FileManager } from "../utils/file-manager.js";
import { getLogger } from "../utils/logger.js";
import ErrorHelper from "../utils/error-helper.js";
import type { ResolvedConfig } from "./index.js";

const isMissingFile = (error: unknown): boolean =>
	typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

/**
 * Load environment variables from .env files.
 * .env.local overrides .env.
 */
export const loadEnvironmentVariables = async (cwd: string = process.cwd()): Promise<number> => {
	const envFiles = [
		{ file: ".env", override: false },
		{ file: ".env.local", override: true },
	];
	let loadedCount = 0;

	for (const { file: envFile, override } of envFiles) {
		const envPath = path.resolve(cwd, envFile);
		try {
			await fs.access(envPath);
		} catch (error) {
			if (!isMissingFile(error)) {
				console.warn(`Warning: Could not load ${envFile}: ${ErrorHelper.getMessage(error)}`);
			}
			continue;
		}

		const result = dotenv.config({ path: envPath, override });
		if (result.error) {
			console.warn(`Warning: Could not load ${envFile}: ${result.error.message}`);
			continue;
		}

		loadedCount++;
		if (process.env.VERBOSE || process.env.DEBUG) {
			console.log(`Loaded environment variables from ${envFile}`);
		}
	}

	return loadedCount;
};

/**
 * Configure global components (file manager, logger) from the loaded config.
 */
export const configureComponents = async (config: ResolvedConfig): Promise<void> => {
	FileManager.configure(config.fileOperations);

	if (config.debug) {
		process.env.DEBUG = "true";
	}

	if (config.logging.verbose) {
		process.env.VERBOSE = "true";
	}

	const logger = getLogger(config.logging);
	if (config.logging.verbose || config.debug) {
		await logger.info("Logger initialized", {
			saveErrorLogs: config.logging.saveErrorLogs,
			logDirectory: config.logging.logDirectory,
		});
	}
};
