/**
 * Base class for language-model providers
 */
import type { AxiosInstance } from "axios";
import ErrorHelper, { ToolError } from "../utils/error-helper.js";
import RetryHelper, { type RetryOptions } from "../utils/retry-helper.js";

/**
 * Prompt in, text out. Rejects with a ModelInvocationError.
 */
export interface TextGenerator {
	readonly name: string;
	generate(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ProviderConfig {
	model?: string;
	temperature?: number;
	maxTokens?: number;
	timeout?: number;
	retryOptions?: Pick<RetryOptions, "maxRetries" | "initialDelay" | "maxDelay">;
}

export interface ResolvedProviderConfig {
	model: string;
	temperature: number;
	maxTokens: number;
}

export type HttpClient = Pick<AxiosInstance, "post">;

abstract class BaseProvider implements TextGenerator {
	readonly name: string;
	protected config: ProviderConfig;
	protected defaultModel: string;
	protected commonHeaders: Record<string, string>;

	constructor(name: string, defaultModel: string, config: ProviderConfig = {}) {
		this.name = name;
		this.config = config;
		this.defaultModel = defaultModel;

		this.commonHeaders = {
			"Content-Type": "application/json",
			"User-Agent": "locsync/1.0",
		};
	}

	abstract getApiKey(): string | undefined;

	abstract getEndpoint(): string;

	/**
	 * One HTTP round trip: send the prompts, return the raw response body.
	 */
	protected abstract send(
		systemPrompt: string,
		userPrompt: string,
		settings: ResolvedProviderConfig
	): Promise<unknown>;

	/**
	 * Pull the generated text out of a response body.
	 */
	protected abstract readContent(data: unknown): string | undefined;

	async generate(systemPrompt: string, userPrompt: string): Promise<string> {
		try {
			const settings = this.getConfig();

			return await RetryHelper.withRetry(
				async () => {
					let data: unknown;
					try {
						data = await this.send(systemPrompt, userPrompt, settings);
					} catch (error) {
						throw this.handleApiError(error);
					}
					return this.extractText(data);
				},
				{
					maxRetries: this.config.retryOptions?.maxRetries ?? 2,
					initialDelay: this.config.retryOptions?.initialDelay ?? 1000,
					maxDelay: this.config.retryOptions?.maxDelay,
					context: `${this.name} provider`,
				}
			);
		} catch (error) {
			throw ErrorHelper.modelInvocationError(this.name, error);
		}
	}

	getConfig(): ResolvedProviderConfig {
		if (!this.getApiKey()) {
			throw ErrorHelper.configValidationError(
				`API key not configured for ${this.name} provider`,
				{ provider: this.name }
			);
		}

		return {
			model: this.config.model || this.defaultModel,
			temperature: this.config.temperature ?? 0.1,
			maxTokens: this.config.maxTokens ?? 2000,
		};
	}

	handleApiError(error: unknown): ToolError {
		return ErrorHelper.fromHttpError(error, this.name);
	}

	extractText(data: unknown): string {
		const content = this.readContent(data)?.trim();

		if (!content) {
			throw ErrorHelper.createError("API_RESPONSE_ERROR", {
				provider: this.name,
				apiMessage: "response contained no text",
			});
		}

		return content;
	}
}

export default BaseProvider;
