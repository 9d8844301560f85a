import type { FileFormatAdapter, SerializeOptions } from "./base-adapter.js";
import ErrorHelper, { isRecord } from "../../utils/error-helper.js";

/**
 * Adapter for JSON files
 */
export class JsonAdapter implements FileFormatAdapter {
	extensions = [".json"];

	async parse(content: string): Promise<Record<string, unknown>> {
		let parsed: unknown;
		try {
			parsed = JSON.parse(content);
		} catch (error) {
			throw new Error(`JSON parse error: ${ErrorHelper.getMessage(error)}`);
		}

		if (!isRecord(parsed)) {
			throw new Error("JSON parse error: root must be an object");
		}
		return parsed;
	}

	async serialize(data: Record<string, unknown>, options: SerializeOptions = {}): Promise<string> {
		return JSON.stringify(data, null, options.indent ?? 2);
	}
}
