import { OpenAIProvider } from "../providers/openai.js";
import { AnthropicProvider } from "../providers/anthropic.js";
import type { ProviderConfig, TextGenerator } from "../providers/base-provider.js";
import ErrorHelper from "../utils/error-helper.js";

export const SUPPORTED_PROVIDERS = ["openai", "anthropic"] as const;

export type ProviderName = (typeof SUPPORTED_PROVIDERS)[number];

const API_KEY_VARIABLES: Record<ProviderName, string> = {
	openai: "OPENAI_API_KEY",
	anthropic: "ANTHROPIC_API_KEY",
};

export const isProviderName = (name: string): name is ProviderName =>
	SUPPORTED_PROVIDERS.some((provider) => provider === name);

/**
 * Creates text generators by provider name.
 */
class ProviderFactory {
	/**
	 * @throws configuration error when the provider is unknown or has no API key
	 */
	static getProvider(providerName: string, config: ProviderConfig = {}): TextGenerator {
		const name = providerName.toLowerCase();

		if (!isProviderName(name)) {
			throw ErrorHelper.configValidationError(
				`Provider ${providerName} is not supported. Use one of: ${SUPPORTED_PROVIDERS.join(", ")}`,
				{ provider: providerName }
			);
		}

		if (!this.isProviderConfigured(name)) {
			throw ErrorHelper.configValidationError(
				`Provider ${name} is not configured. Set ${API_KEY_VARIABLES[name]}.`,
				{ provider: name }
			);
		}

		switch (name) {
			case "openai":
				return new OpenAIProvider(config);
			case "anthropic":
				return new AnthropicProvider(config);
		}
	}

	/**
	 * Providers whose API key is present in the environment.
	 */
	static getAvailableProviders(): ProviderName[] {
		return SUPPORTED_PROVIDERS.filter((name) => this.isProviderConfigured(name));
	}

	static isProviderConfigured(name: ProviderName): boolean {
		return Boolean(process.env[API_KEY_VARIABLES[name]]);
	}
}

export default ProviderFactory;
