/**
 * Prompt templates for translation and review calls.
 */

import type { PlaceholderToken } from "../core/placeholder-codec.js";

export interface PromptPair {
	system: string;
	user: string;
}

export const DEFAULT_CONTEXT = "No specific context provided";

/**
 * "Placeholders found: __PLACEHOLDER_0__ (brace style), ..."
 */
export const describePlaceholders = (tokens: readonly PlaceholderToken[]): string =>
	`Placeholders found: ${tokens.map((t) => `${t.token} (${t.style} style)`).join(", ")}`;

export const getTranslationPrompt = (
	language: string,
	escapedText: string,
	context: string
): PromptPair => ({
	system: [
		`You are a professional translator. Translate the following text to ${language}.`,
		"Maintain the original meaning and context.",
		"IMPORTANT: The text contains special placeholders that must remain EXACTLY as they are.",
		"These placeholders are marked with __PLACEHOLDER_X__ tokens.",
		"Do not translate, reorder the characters of, or otherwise modify these tokens.",
		"Reply with the translated text only.",
	].join("\n"),
	user: `Text to translate: ${escapedText}\nContext: ${context || DEFAULT_CONTEXT}`,
});

export const getReviewPrompt = (
	language: string,
	source: string,
	translation: string,
	context: string
): PromptPair => ({
	system: [
		"You are a professional translator reviewing translations.",
		`Compare the source text and its translation to ${language}.`,
		"Check for:",
		"1. Accuracy of meaning",
		"2. Preservation of placeholders",
		"3. Cultural appropriateness",
		"4. Grammar and spelling",
		"",
		"Respond with exactly two lines:",
		"VERDICT: [APPROVE/REJECT]",
		"REASON: [Brief explanation]",
	].join("\n"),
	user: `Source: ${source}\nTranslation: ${translation}\nContext: ${context || DEFAULT_CONTEXT}`,
});
