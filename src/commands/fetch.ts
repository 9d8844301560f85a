import type { CommandContext } from "../cli/helpers.js";
import type { ProjectResource } from "../services/transifex-client.js";
import { StringStore } from "../services/string-store.js";
import DownloadService, { type DownloadSummary } from "../services/download-service.js";
import ErrorHelper from "../utils/error-helper.js";
import type { FetchMode, StringMode, StringRecord, StringsByLanguage } from "../types/index.js";

export interface FetchOptions {
	mode: FetchMode;
	force: boolean;
	async: boolean;
}

/**
 * Strings of one mode per language, from the CSV cache unless `force` is set
 * or nothing is cached. Freshly fetched strings are written to the cache.
 */
export async function fetchStrings(
	ctx: CommandContext,
	resources: ProjectResource[],
	mode: StringMode,
	force: boolean,
	languages: string[] = ctx.settings.targetLanguages
): Promise<StringsByLanguage> {
	const outputDir = ctx.config.directories.output;

	if (!force) {
		const cached = await StringStore.loadCachedStrings(outputDir, mode, languages);
		if (cached.size > 0) {
			await ctx.logger.info(`Using cached ${mode} strings`);
			return cached;
		}
	}

	await ctx.logger.info(`Downloading ${mode} strings from Transifex`);
	const byLanguage: StringsByLanguage = new Map();

	for (const resource of resources) {
		await ctx.logger.info(`Processing resource: ${resource.name}`);

		for (const language of languages) {
			let records: StringRecord[];
			try {
				records =
					mode === "untranslated"
						? await ctx.platform.getUntranslatedStrings(resource.id, language)
						: await ctx.platform.getUnreviewedStrings(resource.id, language);
			} catch (error) {
				await ctx.logger.error(
					`Error processing ${resource.name} for language ${language}: ${ErrorHelper.getMessage(error)}`
				);
				continue;
			}
			if (records.length === 0) continue;

			const byResource = byLanguage.get(language) ?? new Map<string, StringRecord[]>();
			const list = byResource.get(resource.name) ?? [];
			for (const record of records) {
				list.push(mode === "unreviewed" ? { ...record, translation: record.translation ?? "" } : record);
			}
			byResource.set(resource.name, list);
			byLanguage.set(language, byResource);
		}
	}

	for (const language of byLanguage.keys()) {
		await StringStore.saveStrings(byLanguage, language, mode, outputDir);
	}

	return byLanguage;
}

/**
 * `fetch`: cache strings as CSV, or download translated files with --async.
 */
class FetchCommand {
	private ctx: CommandContext;

	constructor(ctx: CommandContext) {
		this.ctx = ctx;
	}

	async run(options: FetchOptions): Promise<DownloadSummary | StringsByLanguage[]> {
		const resources = await this.ctx.platform.getProjectResources();
		await this.ctx.logger.info(`Found ${resources.length} resources`);

		if (options.async) {
			return this.download(resources, options.force);
		}

		const modes: StringMode[] = options.mode === "all" ? ["untranslated", "unreviewed"] : [options.mode];
		const results: StringsByLanguage[] = [];

		for (const mode of modes) {
			const byLanguage = await fetchStrings(this.ctx, resources, mode, options.force);
			for (const language of byLanguage.keys()) {
				await this.ctx.logger.info(`Saved ${mode} strings for ${language} to CSV`);
			}
			results.push(byLanguage);
		}

		return results;
	}

	private async download(resources: ProjectResource[], force: boolean): Promise<DownloadSummary> {
		const { configFile, ...downloadOptions } = this.ctx.config.download;
		const configs = await DownloadService.loadResourceConfigs(configFile);
		const service = new DownloadService(this.ctx.platform, downloadOptions, this.ctx.logger);

		return service.download(
			resources.map((resource) => ({ id: resource.id, name: resource.name })),
			this.ctx.settings.targetLanguages,
			configs,
			force
		);
	}
}

export default FetchCommand;
