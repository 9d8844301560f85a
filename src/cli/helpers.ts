import type { ResolvedConfig, TransifexSettings } from "../config/index.js";
import { resolveCredentials } from "../config/index.js";
import ProviderFactory from "../core/provider-factory.js";
import type { TextGenerator } from "../providers/base-provider.js";
import { TransifexClient, type ProjectResource } from "../services/transifex-client.js";
import InputValidator from "../utils/input-validator.js";
import ErrorHelper from "../utils/error-helper.js";
import Logger, { getLogger } from "../utils/logger.js";

/**
 * The platform calls the commands make.
 */
export type PlatformClient = Pick<
	TransifexClient,
	| "getProjectResources"
	| "getUntranslatedStrings"
	| "getUnreviewedStrings"
	| "updateTranslation"
	| "reviewTranslation"
	| "createDownloadJob"
	| "checkDownloadStatus"
>;

export interface CommandContext {
	config: ResolvedConfig;
	settings: TransifexSettings;
	platform: PlatformClient;
	createGenerator: () => TextGenerator;
	logger: Logger;
}

/**
 * Build a generator for the configured provider.
 */
export const createGenerator = (config: ResolvedConfig): TextGenerator => {
	const provider = InputValidator.validateProvider(config.provider);
	return ProviderFactory.getProvider(provider, {
		...config.apiConfig[provider],
		retryOptions: config.retryOptions,
	});
};

/**
 * Resolve credentials and languages from the environment and connect to Transifex.
 */
export const createContext = (config: ResolvedConfig, env: NodeJS.ProcessEnv = process.env): CommandContext => {
	const credentials = resolveCredentials(env);
	const settings: TransifexSettings = {
		...credentials,
		targetLanguages: InputValidator.validateLanguageCodes(credentials.targetLanguages),
	};

	return {
		config,
		settings,
		platform: new TransifexClient(settings),
		createGenerator: () => createGenerator(config),
		logger: getLogger(),
	};
};

/**
 * Resource name -> resource id
 */
export const buildResourcesMap = (resources: ProjectResource[]): Map<string, string> =>
	new Map(resources.map((resource) => [resource.name, resource.id]));

/**
 * Print a command failure. Coded errors get the full explanation.
 */
export const reportCommandError = (error: unknown): void => {
	const debug = process.env.DEBUG === "true";

	if (ErrorHelper.isToolError(error)) {
		console.error(ErrorHelper.formatError(error, { showDebug: debug }));
		return;
	}

	console.error(`\nError: ${ErrorHelper.getMessage(error)}`);
	if (debug && error instanceof Error && error.stack) {
		console.error(error.stack);
	}
};
