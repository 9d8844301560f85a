import path from "path";
import yaml from "js-yaml";
import type { TransifexClient } from "./transifex-client.js";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper, { isRecord } from "../utils/error-helper.js";
import RetryHelper from "../utils/retry-helper.js";
import Logger, { getLogger } from "../utils/logger.js";

export type FilterType = "dir" | "file";

export interface ResourceConfig {
	type: FilterType;
	/** Transifex file format, e.g. PO or KEYVALUEJSON */
	format: string;
	/** Translation path with a `<lang>` placeholder */
	pathExpression: string;
}

export interface DownloadOptions {
	initialWaitMs: number;
	pollIntervalMs: number;
	maxAttempts: number;
	maxPolls: number;
	/** Directory that translation paths are relative to */
	baseDir: string;
}

export interface DownloadTarget {
	id: string;
	name: string;
}

export interface DownloadJob {
	jobId: string;
	resource: string;
	language: string;
	outputPath: string;
	format: string;
}

export interface FailedDownload {
	resource: string;
	language?: string;
	reason: string;
}

export interface DownloadSummary {
	completed: DownloadJob[];
	failed: FailedDownload[];
	skipped: { resource: string; language: string; outputPath: string }[];
	/** Configured project names no Transifex resource matched */
	unmatched: string[];
}

type DownloadClient = Pick<TransifexClient, "createDownloadJob" | "checkDownloadStatus">;

export const DEFAULT_DOWNLOAD_OPTIONS: DownloadOptions = {
	initialWaitMs: 15000,
	pollIntervalMs: 5000,
	maxAttempts: 3,
	maxPolls: 60,
	baseDir: ".",
};

const projectNameOf = (filePath: string): string | undefined => {
	const parts = filePath.split("/");
	return parts.length > 2 ? parts[1] : undefined;
};

export const normalizeName = (name: string): string => name.toLowerCase().replace(/_/g, "-").replace(/\./g, "-");

/**
 * Names to try, in order, when matching a Transifex resource against the
 * configured projects.
 */
export const nameVariations = (resourceName: string): string[] => {
	const baseName = resourceName.split(".")[0] ?? resourceName;
	const normalized = baseName.toLowerCase().replace(/_/g, "-");
	const variations = [baseName, normalized];

	if (normalized.includes("/")) {
		const parts = normalized.split("/");
		variations.push(...parts);
		variations.push(...parts.filter((part) => part.includes("-input")).map((part) => part.split("-input")[0] ?? part));
	}

	if (normalized.endsWith("-js")) {
		variations.push(normalized.slice(0, -3));
	}

	return variations;
};

/**
 * Downloads translated files through asynchronous export jobs and writes them
 * where transifex.yml says they belong.
 */
class DownloadService {
	private client: DownloadClient;
	private options: DownloadOptions;
	private logger: Logger;

	constructor(client: DownloadClient, options: Partial<DownloadOptions> = {}, logger?: Logger) {
		this.client = client;
		this.options = { ...DEFAULT_DOWNLOAD_OPTIONS, ...options };
		this.logger = logger ?? getLogger();
	}

	/**
	 * Read `git.filters` from a transifex.yml, keyed by project name.
	 */
	static async loadResourceConfigs(configPath: string): Promise<Map<string, ResourceConfig>> {
		const document: unknown = yaml.load(await FileManager.readText(configPath));
		const configs = new Map<string, ResourceConfig>();

		const git = isRecord(document) ? document.git : undefined;
		const filters = isRecord(git) && Array.isArray(git.filters) ? git.filters : [];

		for (const filter of filters) {
			if (!isRecord(filter)) continue;
			const { filter_type: type, file_format: format, translation_files_expression: expression } = filter;
			if ((type !== "dir" && type !== "file") || typeof format !== "string" || typeof expression !== "string") {
				continue;
			}

			const sourcePath = type === "dir" ? filter.source_file_dir : filter.source_file;
			const projectName = typeof sourcePath === "string" ? projectNameOf(sourcePath) : undefined;
			if (projectName) {
				configs.set(projectName, { type, format, pathExpression: expression });
			}
		}

		return configs;
	}

	/**
	 * Find the configured project for a resource name.
	 */
	static matchResource(
		resourceName: string,
		configs: Map<string, ResourceConfig>
	): { name: string; config: ResourceConfig } | undefined {
		const normalized = new Map<string, string>();
		for (const name of configs.keys()) {
			const key = normalizeName(name);
			normalized.set(key, name);
			const baseKey = key.split("-input")[0] ?? key;
			if (baseKey !== key) normalized.set(baseKey, name);
		}

		for (const variation of nameVariations(resourceName)) {
			const name = normalized.get(variation);
			const config = name !== undefined ? configs.get(name) : undefined;
			if (name !== undefined && config) return { name, config };
		}
		return undefined;
	}

	/**
	 * Relative output path of a resource's translation file.
	 */
	static outputPath(config: ResourceConfig, resourceName: string, language: string): string {
		const relative = config.pathExpression.replace(/<lang>/g, language);
		if (config.type !== "dir" || config.format !== "PO") return relative;

		const baseName = (resourceName.split(".")[0] ?? resourceName).toLowerCase().replace(/_/g, "-");
		const fileName = baseName.endsWith("-js") ? "djangojs.po" : "django.po";
		// Everything before the last slash, so "locale/<lang>/" keeps its language directory
		const directory = relative.slice(0, Math.max(relative.lastIndexOf("/"), 0));
		return path.join(directory, "LC_MESSAGES", fileName);
	}

	async download(
		resources: DownloadTarget[],
		languages: string[],
		configs: Map<string, ResourceConfig>,
		force = false
	): Promise<DownloadSummary> {
		const summary: DownloadSummary = { completed: [], failed: [], skipped: [], unmatched: [] };
		const jobs: DownloadJob[] = [];
		const matched = new Set<string>();

		for (const resource of resources) {
			const match = DownloadService.matchResource(resource.name, configs);
			if (!match) {
				const tried = nameVariations(resource.name).join(", ");
				await this.logger.warn(`No configuration found for ${resource.name} in transifex.yml`);
				summary.failed.push({
					resource: resource.name,
					reason: `No configuration in transifex.yml (tried: ${tried})`,
				});
				continue;
			}
			matched.add(match.name);

			for (const language of languages) {
				const outputPath = path.join(
					this.options.baseDir,
					DownloadService.outputPath(match.config, resource.name, language)
				);

				if (!force && (await FileManager.exists(outputPath))) {
					await this.logger.info(`Skipping existing file: ${outputPath}`);
					summary.skipped.push({ resource: resource.name, language, outputPath });
					continue;
				}

				try {
					const jobId = await this.client.createDownloadJob(resource.id, language, {
						contentEncoding: "text",
					});
					await this.logger.info(`Job created for ${resource.name} (${language}): ${jobId}`);
					jobs.push({ jobId, resource: resource.name, language, outputPath, format: match.config.format });
				} catch (error) {
					const message = ErrorHelper.getMessage(error);
					await this.logger.error(`Error creating download job for ${resource.name} - ${language}`, {
						details: message,
					});
					summary.failed.push({
						resource: resource.name,
						language,
						reason: `Job creation failed: ${message}`,
					});
				}
			}
		}

		if (jobs.length > 0) {
			await this.logger.info(`Waiting ${this.options.initialWaitMs / 1000} seconds for jobs to initialize...`);
			await RetryHelper.delay(this.options.initialWaitMs);
		}

		for (const job of jobs) {
			const failure = await this.complete(job);
			if (failure) {
				summary.failed.push(failure);
			} else {
				summary.completed.push(job);
			}
		}

		summary.unmatched = [...configs.keys()].filter((name) => !matched.has(name)).sort();
		await this.logSummary(summary, configs.size, matched.size);
		return summary;
	}

	/**
	 * Poll one job until it finishes and write its file.
	 * @returns the failure, or undefined once the file is written
	 */
	private async complete(job: DownloadJob): Promise<FailedDownload | undefined> {
		const { maxAttempts, maxPolls, pollIntervalMs } = this.options;
		let attempts = 0;
		let polls = 0;

		while (polls < maxPolls) {
			polls++;
			try {
				const status = await this.client.checkDownloadStatus(job.jobId);

				if (status.status === "completed") {
					await FileManager.writeText(job.outputPath, status.content ?? "");
					await this.logger.info(`Saved file: ${job.outputPath}`);
					return undefined;
				}

				if (status.status === "failed") {
					const details = status.errors?.length ? `: ${status.errors.join("; ")}` : "";
					return {
						resource: job.resource,
						language: job.language,
						reason: `Download failed with status: failed${details}`,
					};
				}

				this.logger.log(`Job ${job.jobId} is ${status.status}`, true);
			} catch (error) {
				attempts++;
				const message = ErrorHelper.getMessage(error);
				await this.logger.error(`Error checking job ${job.jobId}`, { details: message });
				if (attempts >= maxAttempts) {
					return {
						resource: job.resource,
						language: job.language,
						reason: `Failed after ${attempts} attempts: ${message}`,
					};
				}
			}

			await RetryHelper.delay(pollIntervalMs);
		}

		return {
			resource: job.resource,
			language: job.language,
			reason: `Job did not finish after ${maxPolls} polls`,
		};
	}

	private async logSummary(summary: DownloadSummary, configured: number, processed: number): Promise<void> {
		const lines = [
			"Download Summary:",
			`Configurations in transifex.yml: ${configured}`,
			`Resources processed: ${processed}`,
			`Completed: ${summary.completed.length}`,
			`Failed: ${summary.failed.length}`,
			`Skipped: ${summary.skipped.length}`,
		];
		if (summary.unmatched.length > 0) {
			lines.push(`Not processed: ${summary.unmatched.join(", ")}`);
		}
		for (const failure of summary.failed) {
			lines.push(`  ${failure.resource} (${failure.language ?? "N/A"}): ${failure.reason}`);
		}
		await this.logger.info(lines.join("\n"));
	}
}

export { DownloadService };
export default DownloadService;
