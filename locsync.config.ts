/**
 * locsync configuration
 * Credentials and target languages come from the environment (.env, .env.local).
 */

import { defineConfig } from "./src/config/index.js";

export default defineConfig({
	provider: "openai",
	apiConfig: {
		openai: {
			model: "gpt-4o-mini",
			temperature: 0.1,
			maxTokens: 2000,
		},
		anthropic: {
			model: "claude-3-5-haiku-latest",
			temperature: 0.1,
			maxTokens: 2000,
		},
	},

	// Concurrent model calls per batch
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
		logRotation: {
			enabled: true,
			maxFiles: 5,
			maxSize: "10MB",
		},
	},

	fileOperations: {
		atomic: true,
		createMissingDirs: true,
		backupFiles: false,
	},
});
