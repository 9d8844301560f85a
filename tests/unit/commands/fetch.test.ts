import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import FetchCommand, { fetchStrings } from "../../../src/commands/fetch.js";
import RetryHelper from "../../../src/utils/retry-helper.js";
import { createTestContext, resource } from "../../helpers/command-context.js";

describe("fetch", () => {
	let root: string;

	beforeEach(async () => {
		vi.spyOn(console, "log").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
		vi.spyOn(console, "error").mockImplementation(() => {});
		root = await fs.mkdtemp(path.join(os.tmpdir(), "locsync-fetch-"));
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await fs.rm(root, { recursive: true, force: true });
	});

	describe("fetchStrings", () => {
		it("should download strings per resource and cache them as CSV", async () => {
			const { ctx, platform } = createTestContext(root, { languages: ["de", "fr"] });
			platform.getUntranslatedStrings.mockImplementation(async (resourceId, language) =>
				language === "de" ? [{ key: `${resourceId.split(":").pop()}.title`, source: "Title, long", context: "" }] : []
			);

			const byLanguage = await fetchStrings(ctx, [resource("app"), resource("docs")], "untranslated", false);

			expect([...byLanguage.keys()]).toEqual(["de"]);
			expect(platform.getUntranslatedStrings).toHaveBeenCalledTimes(4);
			expect(await fs.readFile(path.join(root, "output", "untranslated_de.csv"), "utf8")).toBe(
				'Resource,String Key,Source String,Context\napp,app.title,"Title, long",\ndocs,docs.title,"Title, long",\n'
			);
			expect((await fs.readdir(path.join(root, "output"))).sort()).toEqual(["untranslated_de.csv"]);
		});

		it("should use the cache unless forced", async () => {
			const { ctx, platform } = createTestContext(root);
			await fs.mkdir(path.join(root, "output"), { recursive: true });
			await fs.writeFile(
				path.join(root, "output", "unreviewed_de.csv"),
				"Resource,String Key,Source String,Translation,Context\napp,k1,Hello,Hallo,greeting\n"
			);

			const cached = await fetchStrings(ctx, [resource("app")], "unreviewed", false);

			expect(cached.get("de")?.get("app")).toEqual([
				{ key: "k1", source: "Hello", translation: "Hallo", context: "greeting" },
			]);
			expect(platform.getUnreviewedStrings).not.toHaveBeenCalled();

			await fetchStrings(ctx, [resource("app")], "unreviewed", true);
			expect(platform.getUnreviewedStrings).toHaveBeenCalledWith("o:acme:p:webapp:r:app", "de");
		});

		it("should log and skip a failing resource", async () => {
			const { ctx, platform } = createTestContext(root);
			const errorSpy = vi.spyOn(ctx.logger, "error");
			platform.getUntranslatedStrings
				.mockRejectedValueOnce(new Error("boom"))
				.mockResolvedValueOnce([{ key: "k", source: "s", context: "" }]);

			const byLanguage = await fetchStrings(ctx, [resource("app"), resource("docs")], "untranslated", true);

			expect([...(byLanguage.get("de")?.keys() ?? [])]).toEqual(["docs"]);
			expect(errorSpy).toHaveBeenCalledWith("Error processing app for language de: boom");
		});
	});

	describe("FetchCommand", () => {
		it("should fetch both modes for --mode all", async () => {
			const { ctx, platform } = createTestContext(root);
			platform.getProjectResources.mockResolvedValue([resource("app")]);
			platform.getUntranslatedStrings.mockResolvedValue([{ key: "a", source: "A", context: "" }]);
			platform.getUnreviewedStrings.mockResolvedValue([{ key: "b", source: "B", context: "" }]);

			const results = await new FetchCommand(ctx).run({ mode: "all", force: false, async: false });

			expect(Array.isArray(results)).toBe(true);
			expect((await fs.readdir(path.join(root, "output"))).sort()).toEqual(["unreviewed_de.csv", "untranslated_de.csv"]);
			expect(await fs.readFile(path.join(root, "output", "unreviewed_de.csv"), "utf8")).toBe(
				"Resource,String Key,Source String,Translation,Context\napp,b,B,,\n"
			);
		});

		it("should hand resources to the export job downloader with --async", async () => {
			vi.spyOn(RetryHelper, "delay").mockResolvedValue();
			const { ctx, platform } = createTestContext(root);
			const configFile = path.join(root, "transifex.yml");
			await fs.writeFile(
				configFile,
				[
					"git:",
					"  filters:",
					"    - filter_type: dir",
					"      file_format: PO",
					"      source_file_dir: src/shop/locale/en/LC_MESSAGES",
					"      translation_files_expression: src/shop/locale/<lang>/",
					"",
				].join("\n")
			);
			ctx.config.download.configFile = configFile;
			platform.getProjectResources.mockResolvedValue([resource("billing")]);

			const summary = await new FetchCommand(ctx).run({ mode: "untranslated", force: false, async: true });

			expect(summary).toMatchObject({
				completed: [],
				failed: [{ resource: "billing", reason: "No configuration in transifex.yml (tried: billing, billing)" }],
				unmatched: ["shop"],
			});
			expect(platform.createDownloadJob).not.toHaveBeenCalled();
			expect(platform.getUntranslatedStrings).not.toHaveBeenCalled();
		});
	});
});
