import path from "path";
import prompts from "prompts";
import { buildResourcesMap, type CommandContext } from "../cli/helpers.js";
import ReviewCoordinator, { type ReviewFileResult } from "../core/review-coordinator.js";
import type { ProjectResource } from "../services/transifex-client.js";
import { StringStore } from "../services/string-store.js";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper from "../utils/error-helper.js";
import type { ReviewResult } from "../types/index.js";
import { fetchStrings } from "./fetch.js";

export interface ReviewOptions {
	language?: string;
	update: boolean;
	force: boolean;
	approveAll: boolean;
	workers: number;
}

export interface ReviewUpdateSummary {
	reviewed: number;
	skipped: number;
	failed: number;
}

/**
 * `review`: have the model review unreviewed translations into approved and
 * rejected CSVs, or with --update push the approved ones back as reviewed.
 */
class ReviewCommand {
	private ctx: CommandContext;
	private resources: ProjectResource[] | null = null;

	constructor(ctx: CommandContext) {
		this.ctx = ctx;
	}

	async run(options: ReviewOptions): Promise<ReviewFileResult[] | ReviewUpdateSummary> {
		return options.update ? this.pushApproved(options) : this.reviewLanguages(options);
	}

	/**
	 * Review `unreviewed_<lang>.csv` for the requested language, or for every
	 * language with a cached file.
	 */
	async reviewLanguages(options: ReviewOptions): Promise<ReviewFileResult[]> {
		const { config, logger } = this.ctx;
		const languages = options.language
			? [options.language]
			: await StringStore.listCachedLanguages(config.directories.output, "unreviewed_");

		if (languages.length === 0) {
			await logger.warn(
				"No languages found for review. Please fetch unreviewed strings first or specify a language."
			);
			return [];
		}

		const generator = this.ctx.createGenerator();
		const results: ReviewFileResult[] = [];

		for (const language of languages) {
			const inputCsv = path.join(config.directories.output, StringStore.fileName("unreviewed", language));

			if (options.force || !(await FileManager.exists(inputCsv))) {
				await logger.info(`Fetching unreviewed strings for ${language}...`);
				const fetched = await fetchStrings(this.ctx, await this.loadResources(), "unreviewed", true, [
					language,
				]);
				if (!fetched.get(language)) {
					await logger.info(`No unreviewed strings found for ${language}`);
					continue;
				}
			}

			await logger.info(`Reviewing translations for ${language}`);
			const coordinator = new ReviewCoordinator({ language, generator, logger });
			results.push(await coordinator.reviewFile(inputCsv, config.directories.reviews, options.workers));
		}

		return results;
	}

	/**
	 * Mark rows of `approved_<lang>.csv` as reviewed, asking for each one
	 * unless `approveAll` is set.
	 */
	async pushApproved(options: ReviewOptions): Promise<ReviewUpdateSummary> {
		const { config, logger } = this.ctx;
		const summary: ReviewUpdateSummary = { reviewed: 0, skipped: 0, failed: 0 };
		const reviewsDir = config.directories.reviews;

		const languages = options.language
			? [options.language]
			: await StringStore.listCachedLanguages(reviewsDir, "approved_");
		const files: [string, string][] = [];

		for (const language of languages) {
			const approvedFile = path.join(reviewsDir, `approved_${language}.csv`);
			if (await FileManager.exists(approvedFile)) {
				files.push([language, approvedFile]);
			} else {
				await logger.warn(`No approved translations found for ${language}`);
			}
		}

		if (files.length === 0) {
			await logger.warn("No approved translations found to update.");
			return summary;
		}

		const resourcesMap = buildResourcesMap(await this.loadResources());

		for (const [language, approvedFile] of files) {
			await logger.info(`Processing approved translations for ${language} from ${approvedFile}`);

			for (const row of await StringStore.readReviewResults(approvedFile)) {
				const resourceId = resourcesMap.get(row.resourceName);
				if (!resourceId) {
					await logger.warn(`Resource not found for: ${row.resourceName}`);
					summary.skipped++;
					continue;
				}

				if (!options.approveAll && !(await this.confirm(row))) {
					await logger.info("Skipped.");
					summary.skipped++;
					continue;
				}

				try {
					if (await this.ctx.platform.reviewTranslation(resourceId, language, row.key)) {
						summary.reviewed++;
						await logger.info(`Marked as reviewed in Transifex: ${row.key}`);
					} else {
						summary.skipped++;
					}
				} catch (error) {
					summary.failed++;
					await logger.error(`Error reviewing translation for key ${row.key}: ${ErrorHelper.getMessage(error)}`);
				}
			}

			await logger.info(`Finished processing ${approvedFile}`);
		}

		return summary;
	}

	private async confirm(row: ReviewResult): Promise<boolean> {
		console.log(`\nReview translation for: ${row.key}`);
		console.log(`Source: ${row.source}`);
		console.log(`Translation: ${row.translation}`);
		console.log(`Explanation: ${row.explanation}`);

		const response = await prompts({
			type: "confirm",
			name: "approve",
			message: "Mark as reviewed in Transifex?",
			initial: false,
		});
		return response.approve === true;
	}

	private async loadResources(): Promise<ProjectResource[]> {
		if (!this.resources) {
			this.resources = await this.ctx.platform.getProjectResources();
			await this.ctx.logger.info(`Found ${this.resources.length} resources`);
		}
		return this.resources;
	}
}

export default ReviewCommand;
