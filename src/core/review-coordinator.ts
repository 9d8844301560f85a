import path from "path";
import pLimit from "p-limit";
import type { TextGenerator } from "../providers/base-provider.js";
import type { ReviewBatch, ReviewResult, TranslationItem, TranslationRecord } from "../types/index.js";
import { ResultQueue } from "./result-queue.js";
import ReviewEngine from "./review-engine.js";
import TranslationEngine from "./translation-engine.js";
import type { PlaceholderCodec } from "./placeholder-codec.js";
import { StringStore } from "../services/string-store.js";
import ErrorHelper from "../utils/error-helper.js";
import Logger, { getLogger } from "../utils/logger.js";

export const DEFAULT_WORKER_COUNT = 4;

export interface ReviewCoordinatorOptions {
	language: string;
	generator: TextGenerator;
	codec?: PlaceholderCodec;
	logger?: Logger;
	/** Called once per item as it completes; defaults to a console report */
	onResult?: (result: ReviewResult) => void | Promise<void>;
}

export interface ReviewFileResult {
	approvedFile: string;
	rejectedFile: string;
	batch: ReviewBatch;
}

/**
 * Fans a batch out over a bounded pool of workers. Per-item failures are
 * absorbed by the engines; only an unusable worker count fails the call.
 */
class ReviewCoordinator {
	readonly language: string;
	private generator: TextGenerator;
	private codec?: PlaceholderCodec;
	private logger: Logger;
	private onResult: (result: ReviewResult) => void | Promise<void>;

	constructor(options: ReviewCoordinatorOptions) {
		this.language = options.language;
		this.generator = options.generator;
		this.codec = options.codec;
		this.logger = options.logger ?? getLogger();
		this.onResult = options.onResult ?? ((result) => this.reportResult(result));
	}

	/**
	 * Review every item once and partition the results.
	 * @throws PoolCreationError when `workerCount` is not an integer >= 1
	 */
	async processBatch(items: TranslationItem[], workerCount = DEFAULT_WORKER_COUNT): Promise<ReviewBatch> {
		const limit = this.createPool(workerCount);
		const engine = new ReviewEngine({
			language: this.language,
			generator: this.generator,
			logger: this.logger,
		});
		const sink = {
			approved: new ResultQueue<ReviewResult>(),
			rejected: new ResultQueue<ReviewResult>(),
		};
		const all: ReviewResult[] = [];

		this.logger.log(`Reviewing ${items.length} items with ${workerCount} workers`, true);

		await Promise.all(
			items.map((item) =>
				limit(async () => {
					const result = await engine.review(item, sink);
					all.push(result);
					try {
						await this.onResult(result);
					} catch (error) {
						await this.logger.warn(
							`Could not report result for ${result.key}: ${ErrorHelper.getMessage(error)}`
						);
					}
				})
			)
		);

		return {
			approved: sink.approved.drain(),
			rejected: sink.rejected.drain(),
			all,
		};
	}

	/**
	 * Translate every item once. Records come back in completion order.
	 * @throws PoolCreationError when `workerCount` is not an integer >= 1
	 */
	async translateBatch(
		items: TranslationItem[],
		workerCount = DEFAULT_WORKER_COUNT
	): Promise<TranslationRecord[]> {
		const limit = this.createPool(workerCount);
		const engine = new TranslationEngine({
			targetLanguage: this.language,
			generator: this.generator,
			codec: this.codec,
			logger: this.logger,
		});
		const results = new ResultQueue<TranslationRecord>();

		await Promise.all(
			items.map((item) =>
				limit(async () => {
					const translation = await engine.translate(item.source, item.context);
					results.put({
						key: item.key,
						source: item.source,
						translation,
						context: item.context,
						action: "translate",
					});
					await this.logger.info(`Translated: ${item.key}`);
				})
			)
		);

		return results.drain();
	}

	/**
	 * Review a CSV of items and write `approved_<lang>.csv` and `rejected_<lang>.csv`.
	 */
	async reviewFile(
		inputCsv: string,
		outputDir = "reviews",
		workerCount = DEFAULT_WORKER_COUNT
	): Promise<ReviewFileResult> {
		this.assertWorkerCount(workerCount);

		const items = await StringStore.readReviewItems(inputCsv);
		const batch = await this.processBatch(items, workerCount);

		const approvedFile = path.join(outputDir, `approved_${this.language}.csv`);
		const rejectedFile = path.join(outputDir, `rejected_${this.language}.csv`);
		await StringStore.writeReviewResults(batch.approved, approvedFile);
		await StringStore.writeReviewResults(batch.rejected, rejectedFile);

		await this.logger.info(
			[
				"Review Summary:",
				`Total translations reviewed: ${batch.all.length}`,
				`Approved: ${batch.approved.length}`,
				`Rejected: ${batch.rejected.length}`,
				`Approved translations saved to: ${approvedFile}`,
				`Rejected translations saved to: ${rejectedFile}`,
			].join("\n")
		);

		return { approvedFile, rejectedFile, batch };
	}

	private assertWorkerCount(workerCount: number): void {
		if (!Number.isInteger(workerCount) || workerCount < 1) {
			throw ErrorHelper.poolCreationError(workerCount, "worker count must be an integer of at least 1");
		}
	}

	private createPool(workerCount: number): ReturnType<typeof pLimit> {
		this.assertWorkerCount(workerCount);
		return pLimit(workerCount);
	}

	private async reportResult(result: ReviewResult): Promise<void> {
		const status = result.isValid ? "APPROVED" : "REJECTED";
		await this.logger.info(
			[
				`${status}: ${result.key}`,
				`  Source: ${result.source}`,
				`  Translation: ${result.translation}`,
				`  Reason: ${result.explanation}`,
			].join("\n")
		);
	}
}

export default ReviewCoordinator;
