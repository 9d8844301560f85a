import type { FileFormatAdapter, SerializeOptions } from "./base-adapter.js";
import yaml from "js-yaml";
import ErrorHelper, { isRecord } from "../../utils/error-helper.js";

/**
 * Adapter for YAML files
 */
export class YamlAdapter implements FileFormatAdapter {
	extensions = [".yaml", ".yml"];

	async parse(content: string): Promise<Record<string, unknown>> {
		let parsed: unknown;
		try {
			parsed = yaml.load(content);
		} catch (error) {
			throw new Error(`YAML parse error: ${ErrorHelper.getMessage(error)}`);
		}

		// An empty document loads as undefined
		if (parsed === undefined || parsed === null) return {};
		if (!isRecord(parsed)) {
			throw new Error("YAML parse error: root must be a mapping");
		}
		return parsed;
	}

	async serialize(data: Record<string, unknown>, options: SerializeOptions = {}): Promise<string> {
		return yaml.dump(data, {
			indent: options.indent ?? 2,
			lineWidth: -1,
			noRefs: true,
		});
	}
}
