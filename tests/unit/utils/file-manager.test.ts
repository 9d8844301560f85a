import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { FileManager } from "../../../src/utils/file-manager.js";

describe("FileManager", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), "locsync-files-"));
		FileManager.configure({});
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	it("should report a missing file with a coded error", async () => {
		const missing = path.join(dir, "missing.json");

		await expect(FileManager.readText(missing)).rejects.toMatchObject({
			code: "ERR_FILE_NOT_FOUND",
			message: `File not found: ${missing}`,
		});
	});

	it("should write JSON through the adapter and read it back", async () => {
		const file = path.join(dir, "nested", "de.json");

		await FileManager.writeFile(file, { menu: { title: "Titel" } });

		expect(await fs.readFile(file, "utf8")).toBe('{\n  "menu": {\n    "title": "Titel"\n  }\n}');
		expect(await FileManager.readFile(file)).toEqual({ menu: { title: "Titel" } });
	});

	it("should honour the configured indent", async () => {
		FileManager.configure({ indent: 4 });
		const file = path.join(dir, "a.json");

		await FileManager.writeFile(file, { a: 1 });

		expect(await fs.readFile(file, "utf8")).toBe('{\n    "a": 1\n}');
	});

	it("should leave no temp files after an atomic write", async () => {
		await FileManager.writeText(path.join(dir, "out.txt"), "content");

		expect(await fs.readdir(dir)).toEqual(["out.txt"]);
	});

	it("should back up an existing file before overwriting", async () => {
		const file = path.join(dir, "out.txt");
		const backupDir = path.join(dir, "backups");
		await FileManager.writeText(file, "old");

		await FileManager.writeText(file, "new", { backupFiles: true, backupDir });

		const backups = await fs.readdir(backupDir);
		expect(backups).toHaveLength(1);
		expect(await fs.readFile(path.join(backupDir, backups[0] ?? ""), "utf8")).toBe("old");
		expect(await fs.readFile(file, "utf8")).toBe("new");
	});

	it("should wrap parse failures with the file path", async () => {
		const file = path.join(dir, "broken.json");
		await fs.writeFile(file, "{ not json");

		await expect(FileManager.readFile(file)).rejects.toThrow(`File read error (${file}): JSON parse error:`);
	});

	it("should list files recursively with a filter, sorted", async () => {
		await FileManager.writeText(path.join(dir, "b.po"), "");
		await FileManager.writeText(path.join(dir, "a.json"), "{}");
		await FileManager.writeText(path.join(dir, "sub", "c.po"), "");

		const files = await FileManager.listFiles(dir, {
			recursive: true,
			filter: (file) => file.endsWith(".po"),
		});

		expect(files).toEqual([path.join(dir, "b.po"), path.join(dir, "sub", "c.po")]);
		expect(await FileManager.listFiles(dir)).toEqual([path.join(dir, "a.json"), path.join(dir, "b.po")]);
	});

	it("should check existence", async () => {
		expect(await FileManager.exists(dir)).toBe(true);
		expect(await FileManager.exists(path.join(dir, "nope"))).toBe(false);
	});
});
