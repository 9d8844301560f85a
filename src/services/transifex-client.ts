import axios, { type AxiosInstance } from "axios";
import ErrorHelper, { isRecord } from "../utils/error-helper.js";
import Logger, { getLogger } from "../utils/logger.js";
import type { StringRecord } from "../types/index.js";

export const TRANSIFEX_BASE_URL = "https://rest.api.transifex.com";

export type TransifexHttpClient = Pick<AxiosInstance, "get" | "post" | "patch">;

export interface TransifexCredentials {
	apiToken: string;
	organization: string;
	project: string;
}

export interface ProjectResource {
	/** Full id, `o:<org>:p:<proj>:r:<slug>` */
	id: string;
	slug: string;
	name: string;
}

export interface DownloadStatus {
	status: string;
	/** File content, set once the job has completed */
	content?: string;
	errors?: string[];
}

export interface DownloadJobOptions {
	contentEncoding?: "text" | "base64";
	fileType?: "default" | "translated" | "sourceastranslation";
}

interface JsonApiResource {
	id: string;
	type: string;
	attributes: Record<string, unknown>;
	relationships: Record<string, unknown>;
}

const toResource = (value: unknown): JsonApiResource | null => {
	if (!isRecord(value) || typeof value.id !== "string") return null;
	return {
		id: value.id,
		type: typeof value.type === "string" ? value.type : "",
		attributes: isRecord(value.attributes) ? value.attributes : {},
		relationships: isRecord(value.relationships) ? value.relationships : {},
	};
};

const toResources = (value: unknown): JsonApiResource[] =>
	Array.isArray(value)
		? value.map(toResource).filter((resource): resource is JsonApiResource => resource !== null)
		: [];

const stringAttribute = (attributes: Record<string, unknown>, name: string): string => {
	const value = attributes[name];
	return typeof value === "string" ? value : "";
};

const pluralOther = (attributes: Record<string, unknown>): string | undefined => {
	const strings = attributes.strings;
	if (!isRecord(strings)) return undefined;
	return typeof strings.other === "string" ? strings.other : undefined;
};

const relatedId = (resource: JsonApiResource, relation: string): string | undefined => {
	const related = resource.relationships[relation];
	if (!isRecord(related) || !isRecord(related.data)) return undefined;
	return typeof related.data.id === "string" ? related.data.id : undefined;
};

const errorDetail = (error: unknown): string =>
	isRecord(error) && typeof error.detail === "string" ? error.detail : ErrorHelper.getMessage(error);

const nextLink = (document: unknown): string | undefined => {
	if (!isRecord(document) || !isRecord(document.links)) return undefined;
	const next = document.links.next;
	return typeof next === "string" && next ? next : undefined;
};

/**
 * Client for the Transifex REST API (JSON:API).
 */
class TransifexClient {
	private client: TransifexHttpClient;
	private organization: string;
	private project: string;
	private logger: Logger;

	constructor(credentials: TransifexCredentials, client?: TransifexHttpClient, logger?: Logger) {
		if (!credentials.apiToken || !credentials.organization || !credentials.project) {
			throw ErrorHelper.configValidationError("Missing required Transifex credentials");
		}

		this.organization = credentials.organization;
		this.project = credentials.project;
		this.logger = logger ?? getLogger();
		this.client =
			client ??
			axios.create({
				baseURL: TRANSIFEX_BASE_URL,
				headers: {
					Authorization: `Bearer ${credentials.apiToken}`,
					"Content-Type": "application/vnd.api+json",
				},
				timeout: 60000,
			});
	}

	get projectId(): string {
		return `o:${this.organization}:p:${this.project}`;
	}

	/**
	 * Full resource id for a slug or an already qualified id.
	 */
	resourceId(resource: string): string {
		const slug = resource.includes(":") ? (resource.split(":").pop() ?? resource) : resource;
		return `${this.projectId}:r:${slug}`;
	}

	async getProjectResources(): Promise<ProjectResource[]> {
		await this.logger.info(`Fetching resources for project: ${this.project}`);
		const document = await this.request("fetch resources", () =>
			this.client.get<unknown>("/resources", { params: { "filter[project]": this.projectId } })
		);

		return toResources(isRecord(document) ? document.data : undefined).map((resource) => ({
			id: resource.id,
			slug: stringAttribute(resource.attributes, "slug") || (resource.id.split(":").pop() ?? resource.id),
			name: stringAttribute(resource.attributes, "name") || resource.id,
		}));
	}

	async getUntranslatedStrings(resourceId: string, language: string): Promise<StringRecord[]> {
		return this.getResourceTranslations(resourceId, language, { "filter[translated]": "false" });
	}

	async getUnreviewedStrings(resourceId: string, language: string): Promise<StringRecord[]> {
		return this.getResourceTranslations(resourceId, language, { "filter[reviewed]": "false" });
	}

	/**
	 * Set the translation of one key.
	 * @returns false when the key does not exist in the resource
	 */
	async updateTranslation(
		resourceId: string,
		language: string,
		key: string,
		translation: string
	): Promise<boolean> {
		return this.patchTranslation(resourceId, language, key, { strings: { other: translation } });
	}

	/**
	 * Mark the translation of one key as reviewed.
	 * @returns false when the key does not exist in the resource
	 */
	async reviewTranslation(resourceId: string, language: string, key: string): Promise<boolean> {
		return this.patchTranslation(resourceId, language, key, { reviewed: true });
	}

	/**
	 * Start an asynchronous file download.
	 * @returns the job id
	 */
	async createDownloadJob(
		resourceId: string,
		language: string,
		options: DownloadJobOptions = {}
	): Promise<string> {
		const languageId = language.startsWith("l:") ? language : `l:${language}`;
		const payload = {
			data: {
				type: "resource_translations_async_downloads",
				attributes: {
					content_encoding: options.contentEncoding ?? "text",
					file_type: options.fileType ?? "default",
				},
				relationships: {
					language: { data: { type: "languages", id: languageId } },
					resource: { data: { type: "resources", id: this.resourceId(resourceId) } },
				},
			},
		};

		const document = await this.request("create download job", () =>
			this.client.post<unknown>("/resource_translations_async_downloads", payload)
		);
		const job = toResource(isRecord(document) ? document.data : undefined);
		if (!job) {
			throw ErrorHelper.platformError("create download job", new Error("Response has no job id"));
		}
		return job.id;
	}

	/**
	 * Poll a download job. A finished job answers with the file itself, or with
	 * a status document that points at it.
	 */
	async checkDownloadStatus(jobId: string): Promise<DownloadStatus> {
		const body = await this.request("check download status", () =>
			this.client.get<string>(`/resource_translations_async_downloads/${jobId}`, {
				responseType: "text",
				transformResponse: (data: unknown) => data,
			})
		);
		const text = typeof body === "string" ? body : "";

		const job = this.parseStatusDocument(text);
		if (!job) {
			return { status: "completed", content: text };
		}

		const status = stringAttribute(job.attributes, "status") || "pending";
		const downloadUrl = stringAttribute(job.attributes, "download_url");

		if (status === "completed" && downloadUrl) {
			const content = await this.request("download file", () =>
				this.client.get<string>(downloadUrl, {
					responseType: "text",
					transformResponse: (data: unknown) => data,
				})
			);
			return { status, content: typeof content === "string" ? content : "" };
		}

		if (status === "failed") {
			const errors = Array.isArray(job.attributes.errors) ? job.attributes.errors.map(errorDetail) : [];
			return { status, errors };
		}

		return { status };
	}

	/**
	 * A JSON:API document describing the job, or null when the body is the file.
	 */
	private parseStatusDocument(text: string): JsonApiResource | null {
		let document: unknown;
		try {
			document = JSON.parse(text);
		} catch {
			return null;
		}
		if (!isRecord(document)) return null;

		const job = toResource(document.data);
		return job && job.type === "resource_translations_async_downloads" ? job : null;
	}

	private async getResourceTranslations(
		resourceId: string,
		language: string,
		filters: Record<string, string>
	): Promise<StringRecord[]> {
		await this.logger.info(`Fetching translations for resource ${resourceId}, language ${language}`);

		const records: StringRecord[] = [];
		let url = "/resource_translations";
		let params: Record<string, string> | undefined = {
			"filter[resource]": this.resourceId(resourceId),
			"filter[language]": `l:${language}`,
			include: "resource_string",
			...filters,
		};

		for (;;) {
			const requestUrl = url;
			const requestParams = params;
			const document = await this.request("fetch translations", () =>
				this.client.get<unknown>(requestUrl, requestParams ? { params: requestParams } : undefined)
			);
			if (!isRecord(document)) break;

			const sources = new Map<string, Record<string, unknown>>();
			for (const included of toResources(document.included)) {
				if (included.type === "resource_strings") {
					sources.set(included.id, included.attributes);
				}
			}

			for (const translation of toResources(document.data)) {
				const stringId = relatedId(translation, "resource_string");
				const source = stringId ? sources.get(stringId) : undefined;
				const sourceText = source ? pluralOther(source) : undefined;
				if (!source || !sourceText) continue;

				const translated = pluralOther(translation.attributes);
				records.push({
					key: stringAttribute(source, "key"),
					source: sourceText,
					...(translated !== undefined ? { translation: translated } : {}),
					context: stringAttribute(source, "context"),
				});
			}

			const next = nextLink(document);
			if (!next) break;
			// The next link already carries every filter
			url = next;
			params = undefined;
		}

		await this.logger.info(`Completed fetching ${records.length} strings`);
		return records;
	}

	private async resolveStringId(resourceId: string, key: string): Promise<string | undefined> {
		const document = await this.request("look up string", () =>
			this.client.get<unknown>("/resource_strings", {
				params: { "filter[resource]": this.resourceId(resourceId), "filter[key]": key },
			})
		);
		return toResources(isRecord(document) ? document.data : undefined)[0]?.id;
	}

	private async patchTranslation(
		resourceId: string,
		language: string,
		key: string,
		attributes: Record<string, unknown>
	): Promise<boolean> {
		const stringId = await this.resolveStringId(resourceId, key);
		if (!stringId) {
			await this.logger.warn(`Could not find translation ID for key: ${key}`);
			return false;
		}

		const translationId = `${stringId}:l:${language}`;
		await this.request("update translation", () =>
			this.client.patch<unknown>(`/resource_translations/${translationId}`, {
				data: { type: "resource_translations", id: translationId, attributes },
			})
		);
		return true;
	}

	private async request<T>(operation: string, send: () => Promise<{ data: T }>): Promise<T> {
		try {
			const response = await send();
			return response.data;
		} catch (error) {
			throw ErrorHelper.platformError(operation, error);
		}
	}
}

export { TransifexClient };
export default TransifexClient;
