import { buildResourcesMap, type CommandContext } from "../cli/helpers.js";
import { TranslationStore } from "../services/translation-store.js";
import ErrorHelper from "../utils/error-helper.js";

export interface UpdateSummary {
	updated: number;
	reviewed: number;
	skipped: number;
	failed: number;
}

/**
 * `update`: push saved translation results to Transifex. Translate records set
 * the translation; approved review records mark it reviewed.
 */
class UpdateCommand {
	private ctx: CommandContext;

	constructor(ctx: CommandContext) {
		this.ctx = ctx;
	}

	async run(): Promise<UpdateSummary> {
		const { logger, platform } = this.ctx;
		const dir = this.ctx.config.directories.translations;
		const summary: UpdateSummary = { updated: 0, reviewed: 0, skipped: 0, failed: 0 };

		const files = await TranslationStore.loadTranslationFiles(dir);
		if (files.size === 0) {
			await logger.warn(`No translation files found in ${dir}`);
			return summary;
		}

		const resourcesMap = buildResourcesMap(await platform.getProjectResources());

		for (const [language, file] of files) {
			for (const [resourceName, records] of Object.entries(file)) {
				const resourceId = resourcesMap.get(resourceName);
				if (!resourceId) {
					await logger.warn(`Resource ${resourceName} not found in project`);
					summary.skipped += records.length;
					continue;
				}

				await logger.info(`Processing ${records.length} translations for ${resourceName} (${language})`);

				for (const record of records) {
					try {
						if (record.action === "translate") {
							if (await platform.updateTranslation(resourceId, language, record.key, record.translation)) {
								summary.updated++;
								await logger.info(`Updated translation for key: ${record.key}`);
							} else {
								summary.skipped++;
							}
						} else if (record.approved) {
							if (await platform.reviewTranslation(resourceId, language, record.key)) {
								summary.reviewed++;
								await logger.info(`Marked as reviewed for key: ${record.key}`);
							} else {
								summary.skipped++;
							}
						} else {
							summary.skipped++;
						}
					} catch (error) {
						summary.failed++;
						await logger.error(`Error processing key ${record.key}: ${ErrorHelper.getMessage(error)}`);
					}
				}
			}
		}

		return summary;
	}
}

export default UpdateCommand;
