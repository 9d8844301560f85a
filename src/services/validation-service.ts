import path from "path";
import { PlaceholderCodec, defaultCodec } from "../core/placeholder-codec.js";
import { FormatFactory } from "../core/adapters/factory.js";
import { PoAdapter } from "../core/adapters/po-adapter.js";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper, { isRecord } from "../utils/error-helper.js";

export type ValidationFormat = "all" | "po" | "json" | "yaml";

export const VALIDATION_FORMATS: readonly ValidationFormat[] = ["all", "po", "json", "yaml"];

const EXTENSIONS: Record<ValidationFormat, string[]> = {
	all: [".po", ".json", ".yaml", ".yml"],
	po: [".po"],
	json: [".json"],
	yaml: [".yaml", ".yml"],
};

export interface FileValidation {
	valid: boolean;
	error?: string;
}

export interface ValidationReport {
	validFiles: string[];
	invalidFiles: string[];
	errors: { file: string; error: string }[];
}

const describeType = (value: unknown): string => {
	if (value === null) return "null";
	return typeof value;
};

/**
 * Checks that translated files keep the placeholders of their source strings.
 */
class ValidationService {
	private codec: PlaceholderCodec;
	private poAdapter = new PoAdapter();

	constructor(codec: PlaceholderCodec = defaultCodec) {
		this.codec = codec;
	}

	async validateFile(filePath: string): Promise<FileValidation> {
		const ext = path.extname(filePath).toLowerCase();

		try {
			if (ext === ".po") {
				return this.report(await this.checkPo(filePath));
			}
			if (ext === ".json" || ext === ".yaml" || ext === ".yml") {
				return this.report(await this.checkStructured(filePath));
			}
			return { valid: false, error: `Unsupported file format: ${ext}` };
		} catch (error) {
			return { valid: false, error: `Validation error: ${ErrorHelper.getMessage(error)}` };
		}
	}

	/**
	 * Validate every matching file under `directory`, recursively.
	 */
	async validateDirectory(directory: string, format: ValidationFormat = "all"): Promise<ValidationReport> {
		const report: ValidationReport = { validFiles: [], invalidFiles: [], errors: [] };
		const extensions = EXTENSIONS[format];

		const files = await FileManager.listFiles(directory, {
			recursive: true,
			filter: (filePath) => extensions.includes(path.extname(filePath).toLowerCase()),
		});

		for (const file of files) {
			const result = await this.validateFile(file);
			if (result.valid) {
				report.validFiles.push(file);
			} else {
				report.invalidFiles.push(file);
				report.errors.push({ file, error: result.error ?? "" });
			}
		}

		return report;
	}

	formatReport(report: ValidationReport): string {
		const lines = ["", "=== Validation Report ===", "", `Valid files (${report.validFiles.length}):`];
		for (const file of report.validFiles) {
			lines.push(`✓ ${file}`);
		}

		if (report.invalidFiles.length > 0) {
			lines.push("", `Invalid files (${report.invalidFiles.length}):`);
			for (const { file, error } of report.errors) {
				lines.push("", `✗ ${file}`, `   ${error}`);
			}
		}

		return lines.join("\n");
	}

	/**
	 * Placeholder differences between a source string and its translation, or
	 * null when both carry the same set.
	 */
	compare(key: string, source: string, translation: string): string | null {
		const expected = this.codec.extract(source);
		const actual = this.codec.extract(translation);
		const missing = [...expected].filter((placeholder) => !actual.has(placeholder));
		const extra = [...actual].filter((placeholder) => !expected.has(placeholder));

		if (missing.length === 0 && extra.length === 0) return null;

		const parts = [`Key: ${key}`, `Source: ${source}`, `Translation: ${translation}`];
		if (missing.length > 0) parts.push(`Missing placeholders: ${missing.join(", ")}`);
		if (extra.length > 0) parts.push(`Extra placeholders: ${extra.join(", ")}`);
		return parts.join("\n   ");
	}

	private report(errors: string[]): FileValidation {
		return errors.length > 0 ? { valid: false, error: errors.join("\n\n") } : { valid: true };
	}

	private async checkPo(filePath: string): Promise<string[]> {
		const entries = this.poAdapter.entries(await FileManager.readText(filePath));
		const errors: string[] = [];

		for (const entry of entries) {
			if (!entry.msgstr) continue;
			const problem = this.compare(entry.msgid, entry.msgid, entry.msgstr);
			if (problem) errors.push(problem);
		}
		return errors;
	}

	private async checkStructured(filePath: string): Promise<string[]> {
		const adapter = FormatFactory.getAdapter(filePath);
		const data = await adapter.parse(await FileManager.readText(filePath));
		const errors: string[] = [];
		this.walk(data, "", errors);
		return errors;
	}

	private walk(node: Record<string, unknown> | unknown[], parentPath: string, errors: string[]): void {
		const entries: [string, unknown][] = Array.isArray(node)
			? node.map((value, index) => [`${parentPath}[${index}]`, value])
			: Object.entries(node).map(([key, value]) => [parentPath ? `${parentPath}.${key}` : key, value]);

		for (const [currentPath, value] of entries) {
			if (isRecord(value) && typeof value.source === "string" && typeof value.translation === "string") {
				const problem = this.compare(currentPath, value.source, value.translation);
				if (problem) errors.push(problem);
			} else if (isRecord(value) || Array.isArray(value)) {
				this.walk(value, currentPath, errors);
			} else if (typeof value !== "string") {
				errors.push(`Invalid value type at ${currentPath}: ${describeType(value)}`);
			}
		}
	}
}

export { ValidationService };
export default ValidationService;
