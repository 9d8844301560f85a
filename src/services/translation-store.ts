import path from "path";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper, { isRecord } from "../utils/error-helper.js";
import { getLogger } from "../utils/logger.js";
import type { TranslationFile, TranslationRecord } from "../types/index.js";

const toRecord = (value: unknown): TranslationRecord | null => {
	if (!isRecord(value)) return null;
	const { key, source, translation, context, action, approved } = value;
	if (typeof key !== "string" || typeof translation !== "string") return null;
	if (action !== "translate" && action !== "review") return null;

	return {
		key,
		source: typeof source === "string" ? source : "",
		translation,
		context: typeof context === "string" ? context : "",
		action,
		...(typeof approved === "boolean" ? { approved } : {}),
	};
};

/**
 * Keep the resource lists of a parsed `<lang>.json`, dropping malformed entries.
 */
export const toTranslationFile = (data: Record<string, unknown>): TranslationFile => {
	const file: TranslationFile = {};
	for (const [resourceName, entries] of Object.entries(data)) {
		if (!Array.isArray(entries)) continue;
		file[resourceName] = entries
			.map(toRecord)
			.filter((record): record is TranslationRecord => record !== null);
	}
	return file;
};

/**
 * Per-language JSON files of translation and review results, keyed by resource name.
 */
class TranslationStore {
	/**
	 * Append records for one resource to `<dir>/<lang>.json`.
	 */
	static async saveTranslations(
		records: TranslationRecord[],
		language: string,
		resourceName: string,
		dir = "translations"
	): Promise<string> {
		const logger = getLogger();
		const filePath = path.join(dir, `${language}.json`);
		let existing: TranslationFile = {};

		if (await FileManager.exists(filePath)) {
			try {
				existing = toTranslationFile(await FileManager.readFile(filePath));
			} catch (error) {
				await logger.warn(
					`Could not read existing translations from ${filePath}: ${ErrorHelper.getMessage(error)}`
				);
			}
		}

		existing[resourceName] = [...(existing[resourceName] ?? []), ...records];
		await FileManager.writeFile(filePath, existing);

		await logger.info(`Updated translations for ${resourceName} in ${filePath}`);
		return filePath;
	}

	/**
	 * Every `<lang>.json` in `dir`, by language. A missing directory yields an empty map.
	 */
	static async loadTranslationFiles(dir = "translations"): Promise<Map<string, TranslationFile>> {
		const files = new Map<string, TranslationFile>();
		if (!(await FileManager.exists(dir))) return files;

		const paths = await FileManager.listFiles(dir, {
			filter: (filePath) => filePath.endsWith(".json"),
		});

		for (const filePath of paths) {
			const language = path.basename(filePath, ".json");
			files.set(language, toTranslationFile(await FileManager.readFile(filePath)));
		}
		return files;
	}
}

export { TranslationStore };
export default TranslationStore;
