import axios from "axios";
import BaseProvider, {
	type HttpClient,
	type ProviderConfig,
	type ResolvedProviderConfig,
} from "./base-provider.js";
import { isRecord } from "../utils/error-helper.js";

/**
 * OpenAI chat completions.
 */
export class OpenAIProvider extends BaseProvider {
	private client: HttpClient;

	constructor(config: ProviderConfig = {}, client?: HttpClient) {
		super("openai", "gpt-4o-mini", config);

		this.client =
			client ??
			axios.create({
				baseURL: "https://api.openai.com/v1",
				headers: {
					...this.commonHeaders,
					Authorization: `Bearer ${this.getApiKey() ?? ""}`,
				},
				timeout: config.timeout ?? 30000,
				maxRedirects: 0,
			});
	}

	getApiKey(): string | undefined {
		return process.env.OPENAI_API_KEY;
	}

	getEndpoint(): string {
		return "/chat/completions";
	}

	protected async send(
		systemPrompt: string,
		userPrompt: string,
		settings: ResolvedProviderConfig
	): Promise<unknown> {
		const response = await this.client.post<unknown>(this.getEndpoint(), {
			model: settings.model,
			messages: [
				{ role: "system", content: systemPrompt },
				{ role: "user", content: userPrompt },
			],
			temperature: settings.temperature,
			max_completion_tokens: settings.maxTokens,
		});
		return response.data;
	}

	protected readContent(data: unknown): string | undefined {
		if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;

		const choice: unknown = data.choices[0];
		if (isRecord(choice) && isRecord(choice.message) && typeof choice.message.content === "string") {
			return choice.message.content;
		}
		return undefined;
	}
}

export default OpenAIProvider;
