import axios from "axios";
import BaseProvider, {
	type HttpClient,
	type ProviderConfig,
	type ResolvedProviderConfig,
} from "./base-provider.js";
import { isRecord } from "../utils/error-helper.js";

/**
 * Provider implementation for Anthropic (Claude) models.
 */
export class AnthropicProvider extends BaseProvider {
	private client: HttpClient;

	constructor(config: ProviderConfig = {}, client?: HttpClient) {
		super("anthropic", "claude-3-5-haiku-latest", config);

		this.client =
			client ??
			axios.create({
				baseURL: "https://api.anthropic.com/v1",
				headers: {
					...this.commonHeaders,
					"x-api-key": this.getApiKey() ?? "",
					"anthropic-version": "2023-06-01",
				},
				timeout: config.timeout ?? 30000,
				maxRedirects: 0,
			});
	}

	getApiKey(): string | undefined {
		return process.env.ANTHROPIC_API_KEY;
	}

	getEndpoint(): string {
		return "/messages";
	}

	protected async send(
		systemPrompt: string,
		userPrompt: string,
		settings: ResolvedProviderConfig
	): Promise<unknown> {
		const response = await this.client.post<unknown>(this.getEndpoint(), {
			model: settings.model,
			system: systemPrompt,
			messages: [{ role: "user", content: userPrompt }],
			max_tokens: settings.maxTokens,
			temperature: settings.temperature,
		});
		return response.data;
	}

	/**
	 * Text blocks of `content`, joined.
	 */
	protected readContent(data: unknown): string | undefined {
		if (!isRecord(data) || !Array.isArray(data.content)) return undefined;

		const parts: string[] = [];
		for (const block of data.content) {
			if (isRecord(block) && block.type === "text" && typeof block.text === "string") {
				parts.push(block.text);
			}
		}
		return parts.length > 0 ? parts.join("") : undefined;
	}
}

export default AnthropicProvider;
