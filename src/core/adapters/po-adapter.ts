import type { FileFormatAdapter } from "./base-adapter.js";
import gettextParser, { type GetTextTranslations } from "gettext-parser";
import ErrorHelper from "../../utils/error-helper.js";

export interface PoEntry {
	msgctxt?: string;
	msgid: string;
	msgstr: string;
}

/**
 * Adapter for Gettext PO files. Parsing flattens entries to msgid -> msgstr[0];
 * the header entry is skipped.
 */
export class PoAdapter implements FileFormatAdapter {
	extensions = [".po", ".pot"];

	/**
	 * Every non-header entry, across all message contexts.
	 */
	entries(content: string): PoEntry[] {
		let po: GetTextTranslations;
		try {
			po = gettextParser.po.parse(content);
		} catch (error) {
			throw new Error(`PO parse error: ${ErrorHelper.getMessage(error)}`);
		}

		const entries: PoEntry[] = [];
		for (const [msgctxt, messages] of Object.entries(po.translations)) {
			for (const [msgid, entry] of Object.entries(messages)) {
				if (msgid === "") continue;
				entries.push({
					...(msgctxt ? { msgctxt } : {}),
					msgid,
					msgstr: entry.msgstr[0] ?? "",
				});
			}
		}
		return entries;
	}

	async parse(content: string): Promise<Record<string, unknown>> {
		const result: Record<string, unknown> = {};
		for (const entry of this.entries(content)) {
			result[entry.msgid] = entry.msgstr;
		}
		return result;
	}

	async serialize(data: Record<string, unknown>): Promise<string> {
		const messages: GetTextTranslations["translations"][string] = {};

		for (const [key, value] of Object.entries(data)) {
			messages[key] = {
				msgid: key,
				msgstr: [typeof value === "string" ? value : String(value)],
			};
		}

		return gettextParser.po
			.compile({
				charset: "utf-8",
				headers: {
					"Content-Type": "text/plain; charset=utf-8",
				},
				translations: { "": messages },
			})
			.toString();
	}
}
