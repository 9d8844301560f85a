import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ValidationService } from "../../../src/services/validation-service.js";

const write = async (filePath: string, content: string): Promise<string> => {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	await fs.writeFile(filePath, content);
	return filePath;
};

const BAD_PO = `msgid ""
msgstr ""
"Content-Type: text/plain; charset=UTF-8\\n"

msgid "Hello %(name)s"
msgstr "Hallo"

msgid "Pending {count}"
msgstr ""
`;

describe("ValidationService", () => {
	const service = new ValidationService();
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "locsync-validate-"));
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	describe("compare", () => {
		it("should accept matching placeholder sets in any order", () => {
			expect(service.compare("k", "{a} of %s", "%s von {a}")).toBeNull();
		});

		it("should list missing and extra placeholders", () => {
			expect(service.compare("k", "Hi {name}", "Hallo {nom}")).toBe(
				"Key: k\n   Source: Hi {name}\n   Translation: Hallo {nom}\n   Missing placeholders: {name}\n   Extra placeholders: {nom}"
			);
		});
	});

	describe("validateFile", () => {
		it("should check source/translation pairs in nested JSON", async () => {
			const file = await write(
				path.join(dir, "de.json"),
				JSON.stringify({
					greeting: { source: "Hello {name}", translation: "Hallo" },
					nested: { items: [{ source: "%s left", translation: "%s übrig" }], note: "plain" },
				})
			);

			await expect(service.validateFile(file)).resolves.toEqual({
				valid: false,
				error: "Key: greeting\n   Source: Hello {name}\n   Translation: Hallo\n   Missing placeholders: {name}",
			});
		});

		it("should name array positions in the key path", async () => {
			const file = await write(
				path.join(dir, "list.json"),
				JSON.stringify({ list: [{ source: "Hi", translation: "Hallo {x}" }] })
			);

			const result = await service.validateFile(file);

			expect(result.error).toBe("Key: list[0]\n   Source: Hi\n   Translation: Hallo {x}\n   Extra placeholders: {x}");
		});

		it("should report values that are neither text nor containers", async () => {
			const file = await write(path.join(dir, "types.json"), JSON.stringify({ count: 3, flag: null }));

			await expect(service.validateFile(file)).resolves.toEqual({
				valid: false,
				error: "Invalid value type at count: number\n\nInvalid value type at flag: null",
			});
		});

		it("should validate YAML the same way", async () => {
			const file = await write(
				path.join(dir, "fr.yml"),
				"menu:\n  open:\n    source: Open {file}\n    translation: Ouvrir {file}\n"
			);

			await expect(service.validateFile(file)).resolves.toEqual({ valid: true });
		});

		it("should check translated PO entries and skip untranslated ones", async () => {
			const file = await write(path.join(dir, "django.po"), BAD_PO);

			await expect(service.validateFile(file)).resolves.toEqual({
				valid: false,
				error: "Key: Hello %(name)s\n   Source: Hello %(name)s\n   Translation: Hallo\n   Missing placeholders: %(name)s",
			});
		});

		it("should reject unsupported extensions", async () => {
			await expect(service.validateFile(path.join(dir, "notes.txt"))).resolves.toEqual({
				valid: false,
				error: "Unsupported file format: .txt",
			});
		});

		it("should turn parse failures into validation errors", async () => {
			const file = await write(path.join(dir, "broken.json"), "{oops");

			const result = await service.validateFile(file);

			expect(result.valid).toBe(false);
			expect(result.error?.startsWith("Validation error: JSON parse error:")).toBe(true);
		});
	});

	describe("validateDirectory", () => {
		it("should walk subdirectories and filter by format", async () => {
			await write(path.join(dir, "bad.po"), BAD_PO);
			await write(path.join(dir, "good.json"), JSON.stringify({ a: { source: "{x}", translation: "{x}" } }));
			await write(path.join(dir, "sub", "x.yaml"), "a: text\n");
			await write(path.join(dir, "notes.txt"), "ignored");

			const report = await service.validateDirectory(dir);

			expect(report.validFiles).toEqual([path.join(dir, "good.json"), path.join(dir, "sub", "x.yaml")]);
			expect(report.invalidFiles).toEqual([path.join(dir, "bad.po")]);
			expect(report.errors).toHaveLength(1);

			const poOnly = await service.validateDirectory(dir, "po");
			expect(poOnly.validFiles).toEqual([]);
			expect(poOnly.invalidFiles).toEqual([path.join(dir, "bad.po")]);
		});
	});

	describe("formatReport", () => {
		it("should list valid files only when everything passes", () => {
			expect(service.formatReport({ validFiles: ["a.json"], invalidFiles: [], errors: [] })).toBe(
				"\n=== Validation Report ===\n\nValid files (1):\n✓ a.json"
			);
		});

		it("should list errors per invalid file", () => {
			const output = service.formatReport({
				validFiles: [],
				invalidFiles: ["b.po"],
				errors: [{ file: "b.po", error: "Key: x" }],
			});

			expect(output).toBe("\n=== Validation Report ===\n\nValid files (0):\n\nInvalid files (1):\n\n✗ b.po\n   Key: x");
		});
	});
});
