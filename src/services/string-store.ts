import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { FileManager } from "../utils/file-manager.js";
import { isRecord } from "../utils/error-helper.js";
import { getLogger } from "../utils/logger.js";
import type {
	ReviewResult,
	StringMode,
	StringRecord,
	StringsByLanguage,
	TranslationItem,
} from "../types/index.js";

export const COLUMNS = {
	resource: "Resource",
	key: "String Key",
	source: "Source String",
	translation: "Translation",
	context: "Context",
	isValid: "Is Valid",
	explanation: "Explanation",
} as const;

const REVIEW_HEADER = [
	COLUMNS.resource,
	COLUMNS.key,
	COLUMNS.source,
	COLUMNS.translation,
	COLUMNS.context,
	COLUMNS.isValid,
	COLUMNS.explanation,
];

type CsvRow = Record<string, string>;

const toRow = (value: unknown): CsvRow => {
	const row: CsvRow = {};
	if (!isRecord(value)) return row;
	for (const [column, cell] of Object.entries(value)) {
		if (typeof cell === "string") row[column] = cell;
	}
	return row;
};

/**
 * CSV cache of fetched strings and review results.
 */
class StringStore {
	static fileName(mode: StringMode, language: string): string {
		return `${mode}_${language}.csv`;
	}

	static async readRows(csvPath: string): Promise<CsvRow[]> {
		const content = await FileManager.readText(csvPath);
		const records: unknown = parse(content, {
			columns: true,
			bom: true,
			skip_empty_lines: true,
			relax_column_count: true,
		});
		return Array.isArray(records) ? records.map(toRow) : [];
	}

	/**
	 * Write `<mode>_<lang>.csv`. The Translation column exists only for unreviewed strings.
	 */
	static async saveStrings(
		byLanguage: StringsByLanguage,
		language: string,
		mode: StringMode,
		outputDir = "output"
	): Promise<string> {
		const logger = getLogger();
		const withTranslation = mode === "unreviewed";
		const header: string[] = [COLUMNS.resource, COLUMNS.key, COLUMNS.source];
		if (withTranslation) header.push(COLUMNS.translation);
		header.push(COLUMNS.context);

		const resources = byLanguage.get(language) ?? new Map<string, StringRecord[]>();
		const rows: string[][] = [];

		for (const [resourceName, strings] of resources) {
			for (const record of strings) {
				const row = [resourceName, record.key, record.source];
				if (withTranslation) {
					if (!record.translation) {
						await logger.warn(`No translation found for key: ${record.key}`);
					}
					row.push(record.translation ?? "");
				}
				row.push(record.context);
				rows.push(row);
			}
		}

		const filePath = path.join(outputDir, this.fileName(mode, language));
		await FileManager.writeText(filePath, stringify([header, ...rows]));
		await logger.info(`Saved ${resources.size} resources to ${filePath}`);
		return filePath;
	}

	/**
	 * Strings from existing `<mode>_<lang>.csv` files. Languages without a file are absent.
	 */
	static async loadCachedStrings(
		outputDir: string,
		mode: StringMode,
		languages: string[]
	): Promise<StringsByLanguage> {
		const cached: StringsByLanguage = new Map();

		for (const language of languages) {
			const filePath = path.join(outputDir, this.fileName(mode, language));
			if (!(await FileManager.exists(filePath))) continue;

			await getLogger().info(`Found cached ${mode} strings for ${language}`);
			const resources = new Map<string, StringRecord[]>();

			for (const row of await this.readRows(filePath)) {
				const resourceName = row[COLUMNS.resource] ?? "";
				const record: StringRecord = {
					key: row[COLUMNS.key] ?? "",
					source: row[COLUMNS.source] ?? "",
					context: row[COLUMNS.context] ?? "",
				};
				if (mode === "unreviewed" && row[COLUMNS.translation] !== undefined) {
					record.translation = row[COLUMNS.translation];
				}

				const list = resources.get(resourceName) ?? [];
				list.push(record);
				resources.set(resourceName, list);
			}
			cached.set(language, resources);
		}

		return cached;
	}

	/**
	 * Items for review. A missing Translation cell reads as "".
	 */
	static async readReviewItems(csvPath: string): Promise<TranslationItem[]> {
		const rows = await this.readRows(csvPath);
		return rows.map((row) => ({
			resourceName: row[COLUMNS.resource] ?? "",
			key: row[COLUMNS.key] ?? "",
			source: row[COLUMNS.source] ?? "",
			translation: row[COLUMNS.translation] ?? "",
			context: row[COLUMNS.context] ?? "",
		}));
	}

	/**
	 * Write review results with a header row, even when there are none.
	 */
	static async writeReviewResults(results: ReviewResult[], csvPath: string): Promise<void> {
		const rows = results.map((result) => [
			result.resourceName,
			result.key,
			result.source,
			result.translation,
			result.context,
			result.isValid ? "True" : "False",
			result.explanation,
		]);
		await FileManager.writeText(csvPath, stringify([REVIEW_HEADER, ...rows]));
	}

	static async readReviewResults(csvPath: string): Promise<ReviewResult[]> {
		const rows = await this.readRows(csvPath);
		return rows.map((row) => ({
			resourceName: row[COLUMNS.resource] ?? "",
			key: row[COLUMNS.key] ?? "",
			source: row[COLUMNS.source] ?? "",
			translation: row[COLUMNS.translation] ?? "",
			context: row[COLUMNS.context] ?? "",
			isValid: row[COLUMNS.isValid] === "True",
			explanation: row[COLUMNS.explanation] ?? "",
		}));
	}

	/**
	 * Languages that have a `<prefix><lang>.csv` file in `dir`, sorted.
	 */
	static async listCachedLanguages(dir: string, prefix: string): Promise<string[]> {
		if (!(await FileManager.exists(dir))) return [];

		const files = await FileManager.listFiles(dir, {
			filter: (filePath) => {
				const name = path.basename(filePath);
				return name.startsWith(prefix) && name.endsWith(".csv");
			},
		});
		return files.map((filePath) => path.basename(filePath).slice(prefix.length, -".csv".length)).sort();
	}
}

export { StringStore };
export default StringStore;
