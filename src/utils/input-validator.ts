import path from "path";
import ErrorHelper from "./error-helper.js";
import { SUPPORTED_PROVIDERS, isProviderName, type ProviderName } from "../core/provider-factory.js";

const LANGUAGE_CODE = /^([a-z]{2,3})(?:[-_]([a-z]{2}|[a-z]{4}|\d{3}))?$/i;

/**
 * Validation of user-supplied CLI and environment values.
 * Every failure is a configuration error.
 */
class InputValidator {
	static readonly MAX_WORKERS = 32;

	/**
	 * Normalize a language code: `pt-br` -> `pt-BR`, `ZH_hans` -> `zh_Hans`.
	 */
	static validateLanguageCode(code: string, name = "language"): string {
		const trimmed = code.trim();
		if (!trimmed) {
			throw ErrorHelper.configValidationError(`${name} must be a non-empty string`);
		}

		const match = LANGUAGE_CODE.exec(trimmed);
		if (!match) {
			throw ErrorHelper.configValidationError(`Invalid language code: ${code}`, { [name]: code });
		}

		const [, language = "", subtag] = match;
		const separator = trimmed.charAt(language.length);
		if (subtag === undefined) return language.toLowerCase();

		const normalizedSubtag =
			subtag.length === 4 ? subtag.charAt(0).toUpperCase() + subtag.slice(1).toLowerCase() : subtag.toUpperCase();
		return `${language.toLowerCase()}${separator}${normalizedSubtag}`;
	}

	static validateLanguageCodes(codes: string[]): string[] {
		if (codes.length === 0) {
			throw ErrorHelper.configValidationError("At least one target language is required");
		}
		return [...new Set(codes.map((code) => this.validateLanguageCode(code)))];
	}

	static validateProvider(provider: string): ProviderName {
		const name = provider.trim().toLowerCase();
		if (!isProviderName(name)) {
			throw ErrorHelper.configValidationError(
				`Invalid API provider: ${provider}. Supported providers: ${SUPPORTED_PROVIDERS.join(", ")}`,
				{ provider }
			);
		}
		return name;
	}

	static validateWorkerCount(value: string | number): number {
		const count = typeof value === "number" ? value : Number(value.trim());
		if (!Number.isInteger(count) || count < 1 || count > this.MAX_WORKERS) {
			throw ErrorHelper.configValidationError(
				`Worker count must be an integer between 1 and ${this.MAX_WORKERS}, got: ${String(value)}`,
				{ workers: value }
			);
		}
		return count;
	}

	static validateDirectoryPath(dir: string, name = "directory"): string {
		if (!dir.trim()) {
			throw ErrorHelper.configValidationError(`${name} must be a non-empty string`);
		}
		if (dir.includes("\0")) {
			throw ErrorHelper.configValidationError(`Invalid ${name}: contains a null byte`);
		}
		return path.normalize(dir.trim());
	}

	static validateMode<T extends string>(mode: string, allowed: readonly T[], name = "mode"): T {
		const match = allowed.find((candidate) => candidate === mode);
		if (match === undefined) {
			throw ErrorHelper.configValidationError(
				`Invalid ${name}: ${mode}. Expected one of: ${allowed.join(", ")}`,
				{ [name]: mode }
			);
		}
		return match;
	}
}

export default InputValidator;
