import type { TextGenerator } from "../providers/base-provider.js";
import type { ReviewResult, TranslationItem } from "../types/index.js";
import type { ResultQueue } from "./result-queue.js";
import ErrorHelper from "../utils/error-helper.js";
import Logger, { getLogger } from "../utils/logger.js";
import { getReviewPrompt } from "../utils/prompt-templates.js";

export interface ReviewEngineOptions {
	language: string;
	generator: TextGenerator;
	logger?: Logger;
}

/**
 * Where a reviewed item is deposited.
 */
export interface ReviewSink {
	approved: ResultQueue<ReviewResult>;
	rejected: ResultQueue<ReviewResult>;
}

export interface Verdict {
	isValid: boolean;
	explanation: string;
}

const VERDICT_PREFIX = "VERDICT:";
const REASON_PREFIX = "REASON:";

/**
 * Read the VERDICT/REASON pair out of a model reply.
 * @throws ResponseParseError when either line is missing
 */
export const parseVerdict = (content: string): Verdict => {
	const lines = content.split(/\r?\n/).map((line) => line.trimStart());
	const verdictLine = lines.find((line) => line.startsWith(VERDICT_PREFIX));
	const reasonLine = lines.find((line) => line.startsWith(REASON_PREFIX));

	if (verdictLine === undefined || reasonLine === undefined) {
		const missing: string[] = [];
		if (verdictLine === undefined) missing.push(VERDICT_PREFIX);
		if (reasonLine === undefined) missing.push(REASON_PREFIX);
		throw ErrorHelper.responseParseError(missing, content);
	}

	return {
		isValid: verdictLine.includes("APPROVE"),
		explanation: reasonLine.slice(REASON_PREFIX.length).trim(),
	};
};

/**
 * Classifies one translation as approved or rejected. Fails closed: any error
 * becomes a rejected result whose explanation carries the error text.
 */
class ReviewEngine {
	readonly language: string;
	private generator: TextGenerator;
	private logger: Logger;

	constructor(options: ReviewEngineOptions) {
		this.language = options.language;
		this.generator = options.generator;
		this.logger = options.logger ?? getLogger();
	}

	async review(item: TranslationItem, sink?: ReviewSink): Promise<ReviewResult> {
		const translation = item.translation ?? "";
		let verdict: Verdict;

		try {
			const prompt = getReviewPrompt(this.language, item.source, translation, item.context);
			const content = await this.generator.generate(prompt.system, prompt.user);
			verdict = parseVerdict(content);
		} catch (error) {
			const message = ErrorHelper.getMessage(error);
			await this.logger.error(`Error reviewing translation for ${item.key}: ${message}`);
			verdict = { isValid: false, explanation: `Error during review: ${message}` };
		}

		const result: ReviewResult = Object.freeze({
			resourceName: item.resourceName,
			key: item.key,
			source: item.source,
			translation,
			context: item.context,
			isValid: verdict.isValid,
			explanation: verdict.explanation,
		});

		if (sink) {
			(result.isValid ? sink.approved : sink.rejected).put(result);
		}

		return result;
	}
}

export default ReviewEngine;
