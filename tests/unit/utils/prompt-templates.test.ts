import { describe, it, expect } from "vitest";
import {
	DEFAULT_CONTEXT,
	describePlaceholders,
	getReviewPrompt,
	getTranslationPrompt,
} from "../../../src/utils/prompt-templates.js";

describe("prompt templates", () => {
	it("should name the target language and keep the escaped text", () => {
		const prompt = getTranslationPrompt("German", "Hello __PLACEHOLDER_0__", "Greeting");

		expect(prompt.system.split("\n")[0]).toBe(
			"You are a professional translator. Translate the following text to German."
		);
		expect(prompt.user).toBe("Text to translate: Hello __PLACEHOLDER_0__\nContext: Greeting");
	});

	it("should fall back to the default context", () => {
		expect(getTranslationPrompt("de", "Hi", "").user).toBe(`Text to translate: Hi\nContext: ${DEFAULT_CONTEXT}`);
		expect(getReviewPrompt("de", "Hi", "Hallo", "").user).toBe(
			"Source: Hi\nTranslation: Hallo\nContext: No specific context provided"
		);
	});

	it("should ask reviewers for a VERDICT and REASON line", () => {
		const lines = getReviewPrompt("fr", "Hi", "Salut", "ctx").system.split("\n");

		expect(lines).toContain("VERDICT: [APPROVE/REJECT]");
		expect(lines).toContain("REASON: [Brief explanation]");
		expect(lines[1]).toBe("Compare the source text and its translation to fr.");
	});

	it("should describe placeholder tokens with their style", () => {
		expect(
			describePlaceholders([
				{ original: "{name}", style: "brace", token: "__PLACEHOLDER_0__" },
				{ original: "%s", style: "percent", token: "__PLACEHOLDER_1__" },
			])
		).toBe("Placeholders found: __PLACEHOLDER_0__ (brace style), __PLACEHOLDER_1__ (percent style)");
	});
});
