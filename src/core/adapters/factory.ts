import path from "path";
import type { FileFormatAdapter } from "./base-adapter.js";
import { JsonAdapter } from "./json-adapter.js";
import { YamlAdapter } from "./yaml-adapter.js";
import { PoAdapter } from "./po-adapter.js";

/**
 * Factory class to manage file format adapters
 */
export class FormatFactory {
	private static adapters: FileFormatAdapter[] = [new JsonAdapter(), new YamlAdapter(), new PoAdapter()];

	static isSupported(filePath: string): boolean {
		const ext = path.extname(filePath).toLowerCase();
		return this.adapters.some((a) => a.extensions.includes(ext));
	}

	/**
	 * Get adapter for a specific file path
	 * @throws when the extension has no adapter
	 */
	static getAdapter(filePath: string): FileFormatAdapter {
		const ext = path.extname(filePath).toLowerCase();
		const adapter = this.adapters.find((a) => a.extensions.includes(ext));

		if (!adapter) {
			throw new Error(`Unsupported file format: ${ext || filePath}`);
		}

		return adapter;
	}

	/**
	 * Get adapter by format name (json, yaml, po)
	 */
	static getAdapterByFormat(format: string): FileFormatAdapter {
		const formatted = format.startsWith(".") ? format : `.${format}`;
		const adapter = this.adapters.find((a) => a.extensions.includes(formatted));
		if (!adapter) {
			throw new Error(`Unsupported format: ${format}`);
		}
		return adapter;
	}
}
