/**
 * Error catalogue and helpers.
 * Every error raised by the tool carries an `ERR_*` code so the CLI can render
 * a problem / cause / fix block instead of a bare stack trace.
 */

export type ErrorDetails = Record<string, unknown>;

const ErrorCodes = {
	API_RATE_LIMIT: "ERR_API_RATE_LIMIT",
	API_TIMEOUT: "ERR_API_TIMEOUT",
	API_AUTH: "ERR_API_AUTH",
	API_SERVER: "ERR_API_SERVER",
	API_RESPONSE_ERROR: "ERR_API_RESPONSE",
	NETWORK_ERROR: "ERR_NETWORK",
	MODEL_INVOCATION: "ERR_MODEL_INVOCATION",
	RESPONSE_PARSE: "ERR_RESPONSE_PARSE",
	PLACEHOLDER_LOSS: "ERR_PLACEHOLDER_LOSS",
	POOL_CREATION: "ERR_POOL_CREATION",
	CONFIG_VALIDATION: "ERR_CONFIG_VALIDATION",
	FILE_NOT_FOUND: "ERR_FILE_NOT_FOUND",
	PLATFORM_ERROR: "ERR_PLATFORM",
	UNKNOWN: "ERR_UNKNOWN",
} as const;

export type ErrorType = Exclude<keyof typeof ErrorCodes, "UNKNOWN">;
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

interface ErrorDefinition {
	message: (details: ErrorDetails) => string;
	causes: string[];
	solutions: string[];
}

const text = (value: unknown, fallback: string): string =>
	value === undefined || value === null || value === "" ? fallback : String(value);

const ERROR_DEFINITIONS: Record<ErrorType, ErrorDefinition> = {
	API_RATE_LIMIT: {
		message: (d) => `${text(d.provider, "API")} rate limit exceeded`,
		causes: [
			"Too many requests were sent in a short period",
			"The account quota for this API key is exhausted",
		],
		solutions: [
			"Lower the number of workers (--workers)",
			"Wait for the retry-after period and run the command again",
		],
	},
	API_TIMEOUT: {
		message: (d) =>
			`${text(d.provider, "API")} request timed out${d.timeout ? ` after ${String(d.timeout)}ms` : ""}`,
		causes: ["The remote service is slow or overloaded", "The network connection is unstable"],
		solutions: ["Retry the command", "Check your connection to the service"],
	},
	API_AUTH: {
		message: (d) =>
			`${text(d.provider, "API")} authentication failed (${text(d.statusCode, "401")})${d.apiMessage ? `: ${String(d.apiMessage)}` : ""}`,
		causes: ["The API key or token is missing, expired or lacks permissions"],
		solutions: [
			"Check OPENAI_API_KEY / ANTHROPIC_API_KEY / TRANSIFEX_API_TOKEN in your .env file",
			"Generate a new token with access to the project",
		],
	},
	API_SERVER: {
		message: (d) =>
			`${text(d.provider, "API")} server error (${text(d.statusCode, "500")})${d.apiMessage ? `: ${String(d.apiMessage)}` : ""}`,
		causes: ["The remote service returned a 5xx response"],
		solutions: ["Retry later", "Check the service status page"],
	},
	API_RESPONSE_ERROR: {
		message: (d) =>
			`${text(d.provider, "API")} API error (${text(d.statusCode, "unknown status")})${d.apiMessage ? `: ${String(d.apiMessage)}` : ""}`,
		causes: ["The request was rejected by the remote service"],
		solutions: ["Run with --debug to inspect the request details"],
	},
	NETWORK_ERROR: {
		message: (d) => `Could not reach ${text(d.provider, "the remote service")}`,
		causes: ["No network connection", "DNS resolution failed", "A proxy or firewall blocks the request"],
		solutions: ["Check your internet connection", "Check proxy settings"],
	},
	MODEL_INVOCATION: {
		message: (d) => `${text(d.provider, "Model")} invocation failed: ${text(d.reason, "unknown error")}`,
		causes: ["The language model call failed (network, quota or response format)"],
		solutions: [
			"Check the provider API key and quota",
			"Run with --debug to see the underlying error",
		],
	},
	RESPONSE_PARSE: {
		message: (d) => `Could not parse model response: missing ${text(d.missing, "expected lines")}`,
		causes: ["The model did not answer in the requested VERDICT/REASON format"],
		solutions: ["Retry the review", "Try a different model"],
	},
	PLACEHOLDER_LOSS: {
		message: (d) => `Placeholder lost in translation: ${text(d.placeholders, "unknown")}`,
		causes: ["The model dropped or altered a placeholder marker"],
		solutions: ["The source string is kept; translate this string manually"],
	},
	POOL_CREATION: {
		message: (d) =>
			`Cannot create worker pool with ${text(d.workerCount, "an invalid number of")} workers${d.reason ? `: ${String(d.reason)}` : ""}`,
		causes: ["The worker count must be a whole number of at least 1"],
		solutions: ["Pass a positive integer to --workers"],
	},
	CONFIG_VALIDATION: {
		message: (d) => text(d.message, "Invalid configuration"),
		causes: ["Required settings are missing or malformed"],
		solutions: [
			"Set the missing variables in .env or .env.local",
			"Check locsync.config.ts for typos",
		],
	},
	FILE_NOT_FOUND: {
		message: (d) => `File not found: ${text(d.filePath, "unknown path")}`,
		causes: ["The file was never created, or the path is wrong"],
		solutions: ["Run the fetch or review command first", "Check the path"],
	},
	PLATFORM_ERROR: {
		message: (d) =>
			`Transifex ${text(d.operation, "request")} failed${d.statusCode ? ` (${String(d.statusCode)})` : ""}${d.apiMessage ? `: ${String(d.apiMessage)}` : ""}`,
		causes: ["The Transifex API rejected the request"],
		solutions: [
			"Check TRANSIFEX_ORGANIZATION and TRANSIFEX_PROJECT",
			"Check that the resource and language exist in the project",
		],
	},
};

/**
 * Base error type for everything the tool raises on purpose.
 */
export class ToolError extends Error {
	code: ErrorCode;
	details: ErrorDetails;

	constructor(message: string, code: ErrorCode, details: ErrorDetails = {}, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause });
		this.name = "ToolError";
		this.code = code;
		this.details = details;
	}
}

export class ModelInvocationError extends ToolError {
	constructor(message: string, details: ErrorDetails = {}, cause?: unknown) {
		super(message, ErrorCodes.MODEL_INVOCATION, details, cause);
		this.name = "ModelInvocationError";
	}
}

export class ResponseParseError extends ToolError {
	constructor(message: string, details: ErrorDetails = {}) {
		super(message, ErrorCodes.RESPONSE_PARSE, details);
		this.name = "ResponseParseError";
	}
}

export class PlaceholderLossError extends ToolError {
	constructor(message: string, details: ErrorDetails = {}) {
		super(message, ErrorCodes.PLACEHOLDER_LOSS, details);
		this.name = "PlaceholderLossError";
	}
}

export class PoolCreationError extends ToolError {
	constructor(message: string, details: ErrorDetails = {}) {
		super(message, ErrorCodes.POOL_CREATION, details);
		this.name = "PoolCreationError";
	}
}

export interface FormatOptions {
	showDebug?: boolean;
	showSolutions?: boolean;
	showContext?: boolean;
}

/**
 * What could be read off a failed HTTP call (axios error or similar).
 */
export interface HttpErrorInfo {
	message: string;
	status?: number;
	code?: string;
	apiMessage?: string;
	retryAfter?: number;
	timeout?: number;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isErrorType = (type: string): type is ErrorType =>
	Object.prototype.hasOwnProperty.call(ERROR_DEFINITIONS, type);

const findDefinition = (code: string): ErrorDefinition | undefined => {
	const entry = Object.entries(ErrorCodes).find(([, value]) => value === code);
	if (!entry || !isErrorType(entry[0])) return undefined;
	return ERROR_DEFINITIONS[entry[0]];
};

const pickApiMessage = (data: unknown): string | undefined => {
	if (typeof data === "string" && data.trim()) return data.trim();
	if (!isRecord(data)) return undefined;

	if (isRecord(data.error) && typeof data.error.message === "string") {
		return data.error.message;
	}
	if (typeof data.message === "string") return data.message;

	// JSON:API error documents (Transifex)
	if (Array.isArray(data.errors) && data.errors.length > 0) {
		const first: unknown = data.errors[0];
		if (isRecord(first)) {
			if (typeof first.detail === "string") return first.detail;
			if (typeof first.title === "string") return first.title;
		}
	}
	return undefined;
};

class ErrorHelper {
	static ErrorCodes = ErrorCodes;

	/**
	 * Create a coded error from the catalogue. Unknown types fall back to
	 * `ERR_UNKNOWN` with `details.message` as the message.
	 */
	static createError(type: string, details: ErrorDetails = {}, cause?: unknown): ToolError {
		if (!isErrorType(type)) {
			const message =
				typeof details.message === "string" ? details.message : "An unknown error occurred";
			return new ToolError(message, ErrorCodes.UNKNOWN, details, cause);
		}

		const message = ERROR_DEFINITIONS[type].message(details);
		switch (type) {
			case "MODEL_INVOCATION":
				return new ModelInvocationError(message, details, cause);
			case "RESPONSE_PARSE":
				return new ResponseParseError(message, details);
			case "PLACEHOLDER_LOSS":
				return new PlaceholderLossError(message, details);
			case "POOL_CREATION":
				return new PoolCreationError(message, details);
			default:
				return new ToolError(message, ErrorCodes[type], details, cause);
		}
	}

	static isToolError(error: unknown): error is ToolError {
		return error instanceof ToolError;
	}

	/**
	 * Message of any thrown value.
	 */
	static getMessage(error: unknown): string {
		if (error instanceof Error) return error.message;
		if (typeof error === "string") return error;
		if (isRecord(error) && typeof error.message === "string") return error.message;
		return String(error);
	}

	/**
	 * Read status, code and API message off a thrown HTTP error without
	 * depending on the client's error class.
	 */
	static describeHttpError(error: unknown): HttpErrorInfo {
		const info: HttpErrorInfo = { message: this.getMessage(error) };
		if (!isRecord(error)) return info;

		if (typeof error.code === "string") info.code = error.code;
		if (isRecord(error.config) && typeof error.config.timeout === "number") {
			info.timeout = error.config.timeout;
		}

		const response = error.response;
		if (isRecord(response)) {
			if (typeof response.status === "number") info.status = response.status;
			info.apiMessage = pickApiMessage(response.data);

			if (isRecord(response.headers)) {
				const retryAfter = Number(response.headers["retry-after"]);
				if (Number.isFinite(retryAfter)) info.retryAfter = retryAfter;
			}
		}

		return info;
	}

	/**
	 * Map a failed HTTP call to a coded error.
	 * @param error - Thrown value from the HTTP client.
	 * @param service - Name used in messages ("openai", "transifex").
	 */
	static fromHttpError(error: unknown, service: string): ToolError {
		if (error instanceof ToolError) return error;

		const info = this.describeHttpError(error);

		if (info.status !== undefined) {
			if (info.status === 429) {
				return this.rateLimitError(service, {
					retryAfter: info.retryAfter ?? 60,
					statusCode: info.status,
				});
			}
			if (info.status >= 500) {
				return this.serverError(service, info.status, info.apiMessage);
			}
			if (info.status === 401 || info.status === 403) {
				return this.authError(service, info.status, info.apiMessage);
			}
			return this.createError(
				"API_RESPONSE_ERROR",
				{ provider: service, statusCode: info.status, apiMessage: info.apiMessage },
				error
			);
		}

		if (info.code === "ECONNREFUSED" || info.code === "ENOTFOUND") {
			return this.networkError(service);
		}

		if (info.code === "ECONNABORTED" || info.code === "ETIMEDOUT") {
			return this.timeoutError(service, info.timeout);
		}

		return this.createError("UNKNOWN", { message: `${service}: ${info.message}` }, error);
	}

	static rateLimitError(provider: string, details: ErrorDetails = {}): ToolError {
		return this.createError("API_RATE_LIMIT", { provider, ...details });
	}

	static serverError(provider: string, statusCode: number, apiMessage?: string): ToolError {
		return this.createError("API_SERVER", { provider, statusCode, apiMessage });
	}

	static authError(provider: string, statusCode: number, apiMessage?: string): ToolError {
		return this.createError("API_AUTH", { provider, statusCode, apiMessage });
	}

	static networkError(provider: string): ToolError {
		return this.createError("NETWORK_ERROR", { provider });
	}

	static timeoutError(provider: string, timeout?: number): ToolError {
		return this.createError("API_TIMEOUT", { provider, timeout });
	}

	static configValidationError(message: string, details: ErrorDetails = {}): ToolError {
		return this.createError("CONFIG_VALIDATION", { ...details, message });
	}

	static fileNotFoundError(filePath: string): ToolError {
		return this.createError("FILE_NOT_FOUND", { filePath });
	}

	static platformError(operation: string, error: unknown): ToolError {
		const info = this.describeHttpError(error);
		return this.createError(
			"PLATFORM_ERROR",
			{ operation, statusCode: info.status, apiMessage: info.apiMessage ?? info.message },
			error
		);
	}

	static modelInvocationError(provider: string, cause: unknown): ModelInvocationError {
		if (cause instanceof ModelInvocationError) return cause;
		return new ModelInvocationError(
			ERROR_DEFINITIONS.MODEL_INVOCATION.message({
				provider,
				reason: this.getMessage(cause),
			}),
			{
				provider,
				reason: this.getMessage(cause),
				causeCode: cause instanceof ToolError ? cause.code : undefined,
			},
			cause
		);
	}

	static responseParseError(missing: string[], content: string): ResponseParseError {
		return new ResponseParseError(
			ERROR_DEFINITIONS.RESPONSE_PARSE.message({ missing: missing.join(" and ") }),
			{ missing, content }
		);
	}

	static placeholderLossError(placeholders: string[]): PlaceholderLossError {
		return new PlaceholderLossError(
			ERROR_DEFINITIONS.PLACEHOLDER_LOSS.message({ placeholders: placeholders.join(", ") }),
			{ placeholders }
		);
	}

	static poolCreationError(workerCount: unknown, reason?: string): PoolCreationError {
		return new PoolCreationError(
			ERROR_DEFINITIONS.POOL_CREATION.message({ workerCount, reason }),
			{ workerCount, reason }
		);
	}

	/**
	 * Render an error for the terminal.
	 */
	static formatError(error: unknown, options: FormatOptions = {}): string {
		const { showDebug = false, showSolutions = true, showContext = true } = options;

		if (!(error instanceof ToolError)) {
			return `\nError: ${this.getMessage(error)}`;
		}

		const definition = findDefinition(error.code);
		const lines: string[] = [`\nError [${error.code}]`, `Problem: ${error.message}`];

		if (definition && showContext) {
			lines.push("", "Why This Happened:");
			for (const cause of definition.causes) lines.push(`  - ${cause}`);
		}

		if (definition && showSolutions) {
			lines.push("", "How to Fix:");
			definition.solutions.forEach((solution, index) => {
				lines.push(`  ${index + 1}. ${solution}`);
			});
		}

		if (showDebug) {
			lines.push("", "Debug Info:");
			for (const [key, value] of Object.entries(error.details)) {
				if (value === undefined) continue;
				lines.push(`  ${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`);
			}
			if (error.stack) lines.push("", error.stack);
		}

		return lines.join("\n");
	}
}

export default ErrorHelper;
