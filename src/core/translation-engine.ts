import type { TextGenerator } from "../providers/base-provider.js";
import { PlaceholderCodec, defaultCodec } from "./placeholder-codec.js";
import ErrorHelper from "../utils/error-helper.js";
import Logger, { getLogger } from "../utils/logger.js";
import { describePlaceholders, getTranslationPrompt } from "../utils/prompt-templates.js";

export interface TranslationEngineOptions {
	targetLanguage: string;
	generator: TextGenerator;
	codec?: PlaceholderCodec;
	logger?: Logger;
}

export type FallbackReason = "model-error" | "placeholder-loss";

export interface TranslationOutcome {
	translation: string;
	fellBack: boolean;
	reason?: FallbackReason;
	error?: string;
}

/**
 * Translates one string at a time with placeholders protected.
 * Never throws: every failure returns the source string.
 */
class TranslationEngine {
	readonly targetLanguage: string;
	private generator: TextGenerator;
	private codec: PlaceholderCodec;
	private logger: Logger;

	constructor(options: TranslationEngineOptions) {
		this.targetLanguage = options.targetLanguage;
		this.generator = options.generator;
		this.codec = options.codec ?? defaultCodec;
		this.logger = options.logger ?? getLogger();
	}

	async translate(source: string, context?: string): Promise<string> {
		const outcome = await this.translateWithOutcome(source, context);
		return outcome.translation;
	}

	async translateWithOutcome(source: string, context?: string): Promise<TranslationOutcome> {
		const escaped = this.codec.escape(source);

		let augmentedContext = context ?? "";
		if (escaped.tokens.length > 0) {
			augmentedContext += `\n${describePlaceholders(escaped.tokens)}`;
		}

		const prompt = getTranslationPrompt(this.targetLanguage, escaped.text, augmentedContext);

		let output: string;
		try {
			output = await this.generator.generate(prompt.system, prompt.user);
		} catch (error) {
			return this.fallback(source, error);
		}

		const restored = this.codec.restore(output, escaped.tokens);
		const lost = this.codec.findLost(restored, escaped.tokens);

		if (lost.length > 0) {
			const lossError = ErrorHelper.placeholderLossError(lost);
			await this.logger.warn(
				`Placeholder ${lost.join(", ")} was lost in translation to ${this.targetLanguage}; keeping source text`,
				{ source, output }
			);
			return {
				translation: source,
				fellBack: true,
				reason: "placeholder-loss",
				error: lossError.message,
			};
		}

		return { translation: restored, fellBack: false };
	}

	private async fallback(source: string, error: unknown): Promise<TranslationOutcome> {
		const message = ErrorHelper.getMessage(error);
		await this.logger.error(`Error translating text: ${source}`, { details: message });
		return { translation: source, fellBack: true, reason: "model-error", error: message };
	}
}

export default TranslationEngine;
