import type { CommandContext } from "../cli/helpers.js";
import ReviewCoordinator from "../core/review-coordinator.js";
import { TranslationStore } from "../services/translation-store.js";
import { fetchStrings } from "./fetch.js";
import UpdateCommand from "./update.js";
import type { StringMode, TranslationItem, TranslationRecord } from "../types/index.js";

export interface TranslateOptions {
	mode: StringMode;
	update: boolean;
	force: boolean;
	workers: number;
}

/**
 * `translate`: translate untranslated strings, or review unreviewed ones, and
 * save the results per language.
 */
class TranslateCommand {
	private ctx: CommandContext;

	constructor(ctx: CommandContext) {
		this.ctx = ctx;
	}

	async run(options: TranslateOptions): Promise<string[]> {
		const { logger } = this.ctx;
		const resources = await this.ctx.platform.getProjectResources();
		await logger.info(`Found ${resources.length} resources`);

		const byLanguage = await fetchStrings(this.ctx, resources, options.mode, options.force);
		const generator = this.ctx.createGenerator();
		const savedFiles = new Set<string>();

		for (const [language, byResource] of byLanguage) {
			await logger.info(`Processing translations for ${language}`);
			const coordinator = new ReviewCoordinator({ language, generator, logger });

			for (const [resourceName, strings] of byResource) {
				await logger.info(`Processing ${resourceName}...`);
				const items: TranslationItem[] = strings.map((record) => ({ resourceName, ...record }));

				const records =
					options.mode === "untranslated"
						? await coordinator.translateBatch(items, options.workers)
						: await this.reviewRecords(coordinator, items, options.workers);

				savedFiles.add(
					await TranslationStore.saveTranslations(
						records,
						language,
						resourceName,
						this.ctx.config.directories.translations
					)
				);
			}
		}

		if (options.update) {
			await new UpdateCommand(this.ctx).run();
		}

		return [...savedFiles];
	}

	private async reviewRecords(
		coordinator: ReviewCoordinator,
		items: TranslationItem[],
		workers: number
	): Promise<TranslationRecord[]> {
		const batch = await coordinator.processBatch(items, workers);
		return batch.all.map((result) => ({
			key: result.key,
			source: result.source,
			translation: result.translation,
			context: result.context,
			action: "review",
			approved: result.isValid,
		}));
	}
}

export default TranslateCommand;
