import { loadConfig as c12LoadConfig } from "c12";
import type { ProviderConfig } from "../providers/base-provider.js";
import type { ProviderName } from "../core/provider-factory.js";
import type { LoggerConfig } from "../utils/logger.js";
import type { FileOptions } from "../utils/file-manager.js";
import type { RetryOptions } from "../utils/retry-helper.js";
import type { DownloadOptions } from "../services/download-service.js";
import ErrorHelper from "../utils/error-helper.js";

export interface DirectoryConfig {
	/** Cached `<mode>_<lang>.csv` files */
	output: string;
	/** `approved_<lang>.csv` and `rejected_<lang>.csv` */
	reviews: string;
	/** `<lang>.json` translation results */
	translations: string;
}

export type DownloadConfig = Omit<DownloadOptions, "baseDir"> & {
	/** Path of transifex.yml */
	configFile: string;
};

// c12 expects a plain record type, so this stays an alias
export type LocsyncConfig = {
	/**
	 * Model provider
	 * @default "openai"
	 */
	provider?: string;

	/**
	 * Per-provider model settings
	 */
	apiConfig?: Partial<Record<ProviderName, ProviderConfig>>;

	/**
	 * Concurrent model calls per batch
	 * @default 4
	 */
	workers?: number;

	directories?: Partial<DirectoryConfig>;
	download?: Partial<DownloadConfig>;
	retryOptions?: Pick<RetryOptions, "maxRetries" | "initialDelay" | "maxDelay">;
	logging?: LoggerConfig;
	fileOperations?: FileOptions;

	/**
	 * Enable debug output
	 * @default false
	 */
	debug?: boolean;
};

export type ResolvedConfig = {
	provider: string;
	apiConfig: Partial<Record<ProviderName, ProviderConfig>>;
	workers: number;
	directories: DirectoryConfig;
	download: DownloadConfig;
	retryOptions: Pick<RetryOptions, "maxRetries" | "initialDelay" | "maxDelay">;
	logging: LoggerConfig;
	fileOperations: FileOptions;
	debug: boolean;
};

export const DEFAULT_CONFIG: ResolvedConfig = {
	provider: "openai",
	apiConfig: {
		openai: { model: "gpt-4o-mini", temperature: 0.1, maxTokens: 2000 },
		anthropic: { model: "claude-3-5-haiku-latest", temperature: 0.1, maxTokens: 2000 },
	},
	workers: 4,
	directories: {
		output: "output",
		reviews: "reviews",
		translations: "translations",
	},
	download: {
		configFile: "transifex.yml",
		initialWaitMs: 15000,
		pollIntervalMs: 5000,
		maxAttempts: 3,
		maxPolls: 60,
	},
	retryOptions: {
		maxRetries: 2,
		initialDelay: 1000,
		maxDelay: 10000,
	},
	logging: {
		verbose: false,
		diagnosticsLevel: "normal",
		outputFormat: "pretty",
		saveErrorLogs: false,
		logDirectory: "./logs",
	},
	fileOperations: {
		atomic: true,
		createMissingDirs: true,
	},
	debug: false,
};

export interface TransifexSettings {
	apiToken: string;
	organization: string;
	project: string;
	targetLanguages: string[];
}

/**
 * Type-safe configuration helper
 */
export function defineConfig(config: LocsyncConfig): LocsyncConfig {
	return config;
}

/**
 * Fill every section of a partial config from the defaults.
 */
export function resolveConfig(config: LocsyncConfig = {}): ResolvedConfig {
	return {
		provider: config.provider ?? DEFAULT_CONFIG.provider,
		apiConfig: {
			openai: { ...DEFAULT_CONFIG.apiConfig.openai, ...config.apiConfig?.openai },
			anthropic: { ...DEFAULT_CONFIG.apiConfig.anthropic, ...config.apiConfig?.anthropic },
		},
		workers: config.workers ?? DEFAULT_CONFIG.workers,
		directories: { ...DEFAULT_CONFIG.directories, ...config.directories },
		download: { ...DEFAULT_CONFIG.download, ...config.download },
		retryOptions: { ...DEFAULT_CONFIG.retryOptions, ...config.retryOptions },
		logging: { ...DEFAULT_CONFIG.logging, ...config.logging },
		fileOperations: { ...DEFAULT_CONFIG.fileOperations, ...config.fileOperations },
		debug: config.debug ?? DEFAULT_CONFIG.debug,
	};
}

/**
 * Load configuration using c12
 */
export async function loadConfig(cwd: string = process.cwd()) {
	const { config, configFile, layers } = await c12LoadConfig<LocsyncConfig>({
		name: "locsync",
		configFile: "locsync.config",
		rcFile: ".locsyncrc",
		dotenv: true,
		cwd,
		defaults: DEFAULT_CONFIG,
	});

	return {
		config: resolveConfig(config ?? {}),
		configFile,
		layers,
	};
}

/**
 * Read Transifex credentials and target languages from the environment.
 * @throws configuration error naming every missing variable
 */
export function resolveCredentials(env: NodeJS.ProcessEnv = process.env): TransifexSettings {
	const required = [
		"TRANSIFEX_API_TOKEN",
		"TRANSIFEX_ORGANIZATION",
		"TRANSIFEX_PROJECT",
		"TARGET_LANGUAGES",
	] as const;
	const targetLanguages = (env.TARGET_LANGUAGES ?? "")
		.split(",")
		.map((language) => language.trim())
		.filter(Boolean);

	const missing = required.filter((name) =>
		name === "TARGET_LANGUAGES" ? targetLanguages.length === 0 : !env[name]
	);
	if (missing.length > 0) {
		throw ErrorHelper.configValidationError(
			`Missing required environment variables: ${missing.join(", ")}`,
			{ missing }
		);
	}

	return {
		apiToken: env.TRANSIFEX_API_TOKEN ?? "",
		organization: env.TRANSIFEX_ORGANIZATION ?? "",
		project: env.TRANSIFEX_PROJECT ?? "",
		targetLanguages,
	};
}
