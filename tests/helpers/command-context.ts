import path from "path";
import { vi } from "vitest";
import { resolveConfig } from "../../src/config/index.js";
import type { CommandContext } from "../../src/cli/helpers.js";
import type { TextGenerator } from "../../src/providers/base-provider.js";
import type { DownloadJobOptions, DownloadStatus, ProjectResource } from "../../src/services/transifex-client.js";
import type { StringRecord } from "../../src/types/index.js";
import Logger from "../../src/utils/logger.js";

export const resource = (slug: string, name = slug): ProjectResource => ({
	id: `o:acme:p:webapp:r:${slug}`,
	slug,
	name,
});

/**
 * Platform client whose methods are mocks; every call succeeds with nothing by default.
 */
export const createFakePlatform = () => ({
	getProjectResources: vi.fn<() => Promise<ProjectResource[]>>().mockResolvedValue([]),
	getUntranslatedStrings: vi
		.fn<(resourceId: string, language: string) => Promise<StringRecord[]>>()
		.mockResolvedValue([]),
	getUnreviewedStrings: vi
		.fn<(resourceId: string, language: string) => Promise<StringRecord[]>>()
		.mockResolvedValue([]),
	updateTranslation: vi
		.fn<(resourceId: string, language: string, key: string, translation: string) => Promise<boolean>>()
		.mockResolvedValue(true),
	reviewTranslation: vi
		.fn<(resourceId: string, language: string, key: string) => Promise<boolean>>()
		.mockResolvedValue(true),
	createDownloadJob: vi
		.fn<(resourceId: string, language: string, options?: DownloadJobOptions) => Promise<string>>()
		.mockResolvedValue("job-1"),
	checkDownloadStatus: vi
		.fn<(jobId: string) => Promise<DownloadStatus>>()
		.mockResolvedValue({ status: "completed", content: "" }),
});

export const createFakeGenerator = (reply = "") => {
	const generate = vi.fn(async (_system: string, _user: string) => reply);
	const generator: TextGenerator = { name: "fake", generate };
	return { generator, generate };
};

/**
 * A command context whose directories live under `root`.
 */
export const createTestContext = (
	root: string,
	options: { generator?: TextGenerator; languages?: string[] } = {}
) => {
	const platform = createFakePlatform();
	const generator = options.generator ?? createFakeGenerator().generator;
	const ctx: CommandContext = {
		config: resolveConfig({
			directories: {
				output: path.join(root, "output"),
				reviews: path.join(root, "reviews"),
				translations: path.join(root, "translations"),
			},
		}),
		settings: {
			apiToken: "test-token",
			organization: "acme",
			project: "webapp",
			targetLanguages: options.languages ?? ["de"],
		},
		platform,
		createGenerator: () => generator,
		logger: new Logger({ diagnosticsLevel: "minimal" }),
	};
	return { ctx, platform };
};
