import { describe, it, expect } from "vitest";
import ErrorHelper, {
	ModelInvocationError,
	PoolCreationError,
	ToolError,
} from "../../../src/utils/error-helper.js";

describe("ErrorHelper", () => {
	describe("createError", () => {
		it("should build a coded error from the catalogue", () => {
			const error = ErrorHelper.createError("FILE_NOT_FOUND", { filePath: "output/a.csv" });

			expect(error).toBeInstanceOf(ToolError);
			expect(error.code).toBe("ERR_FILE_NOT_FOUND");
			expect(error.message).toBe("File not found: output/a.csv");
		});

		it("should return the dedicated subclass for pool errors", () => {
			expect(ErrorHelper.createError("POOL_CREATION", { workerCount: 0 })).toBeInstanceOf(
				PoolCreationError
			);
		});

		it("should fall back to ERR_UNKNOWN for unknown types", () => {
			const error = ErrorHelper.createError("NOT_A_TYPE", { message: "boom" });

			expect(error.code).toBe("ERR_UNKNOWN");
			expect(error.message).toBe("boom");
		});
	});

	describe("fromHttpError", () => {
		it("should map 429 to a rate limit error with retry-after", () => {
			const error = ErrorHelper.fromHttpError(
				{ message: "Too Many Requests", response: { status: 429, headers: { "retry-after": "30" } } },
				"openai"
			);

			expect(error.code).toBe("ERR_API_RATE_LIMIT");
			expect(error.message).toBe("openai rate limit exceeded");
			expect(error.details.retryAfter).toBe(30);
		});

		it("should map 401 to an auth error with the API message", () => {
			const error = ErrorHelper.fromHttpError(
				{ message: "Unauthorized", response: { status: 401, data: { error: { message: "bad key" } } } },
				"openai"
			);

			expect(error.code).toBe("ERR_API_AUTH");
			expect(error.message).toBe("openai authentication failed (401): bad key");
		});

		it("should map 5xx to a server error", () => {
			const error = ErrorHelper.fromHttpError({ message: "x", response: { status: 503 } }, "anthropic");

			expect(error.code).toBe("ERR_API_SERVER");
			expect(error.message).toBe("anthropic server error (503)");
		});

		it("should read JSON:API error details for other statuses", () => {
			const error = ErrorHelper.fromHttpError(
				{ message: "x", response: { status: 404, data: { errors: [{ detail: "Not found" }] } } },
				"transifex"
			);

			expect(error.code).toBe("ERR_API_RESPONSE");
			expect(error.message).toBe("transifex API error (404): Not found");
		});

		it("should map connection and timeout codes", () => {
			expect(ErrorHelper.fromHttpError({ message: "x", code: "ENOTFOUND" }, "openai").message).toBe(
				"Could not reach openai"
			);
			expect(
				ErrorHelper.fromHttpError(
					{ message: "x", code: "ECONNABORTED", config: { timeout: 60000 } },
					"openai"
				).message
			).toBe("openai request timed out after 60000ms");
		});

		it("should wrap anything else as unknown", () => {
			const error = ErrorHelper.fromHttpError(new Error("weird"), "openai");

			expect(error.code).toBe("ERR_UNKNOWN");
			expect(error.message).toBe("openai: weird");
		});

		it("should pass tool errors through", () => {
			const original = ErrorHelper.configValidationError("bad");
			expect(ErrorHelper.fromHttpError(original, "openai")).toBe(original);
		});
	});

	describe("factories", () => {
		it("should describe Transifex failures with and without a status", () => {
			const withStatus = ErrorHelper.platformError("fetch resources", {
				message: "Request failed",
				response: { status: 404, data: { errors: [{ detail: "Resource missing" }] } },
			});
			expect(withStatus.message).toBe("Transifex fetch resources failed (404): Resource missing");
			expect(withStatus.code).toBe("ERR_PLATFORM");

			const withoutStatus = ErrorHelper.platformError("look up string", new Error("socket hang up"));
			expect(withoutStatus.message).toBe("Transifex look up string failed: socket hang up");
		});

		it("should wrap model failures once", () => {
			const error = ErrorHelper.modelInvocationError("openai", new Error("quota"));

			expect(error).toBeInstanceOf(ModelInvocationError);
			expect(error.message).toBe("openai invocation failed: quota");
			expect(ErrorHelper.modelInvocationError("anthropic", error)).toBe(error);
		});

		it("should name the missing response lines", () => {
			expect(ErrorHelper.responseParseError(["VERDICT:", "REASON:"], "hm").message).toBe(
				"Could not parse model response: missing VERDICT: and REASON:"
			);
		});

		it("should list lost placeholders", () => {
			expect(ErrorHelper.placeholderLossError(["{name}", "%s"]).message).toBe(
				"Placeholder lost in translation: {name}, %s"
			);
		});

		it("should report the rejected worker count", () => {
			expect(ErrorHelper.poolCreationError(0, "too few").message).toBe(
				"Cannot create worker pool with 0 workers: too few"
			);
		});
	});

	describe("getMessage", () => {
		it("should read messages off any thrown value", () => {
			expect(ErrorHelper.getMessage(new Error("e"))).toBe("e");
			expect(ErrorHelper.getMessage("plain")).toBe("plain");
			expect(ErrorHelper.getMessage({ message: "m" })).toBe("m");
			expect(ErrorHelper.getMessage(42)).toBe("42");
		});
	});

	describe("formatError", () => {
		it("should render problem, causes and fixes", () => {
			const output = ErrorHelper.formatError(ErrorHelper.configValidationError("Missing X"));

			expect(output).toBe(
				[
					"\nError [ERR_CONFIG_VALIDATION]",
					"Problem: Missing X",
					"",
					"Why This Happened:",
					"  - Required settings are missing or malformed",
					"",
					"How to Fix:",
					"  1. Set the missing variables in .env or .env.local",
					"  2. Check locsync.config.ts for typos",
				].join("\n")
			);
		});

		it("should append details in debug mode", () => {
			const output = ErrorHelper.formatError(ErrorHelper.configValidationError("Missing X"), {
				showDebug: true,
				showContext: false,
				showSolutions: false,
			});

			expect(output.startsWith("\nError [ERR_CONFIG_VALIDATION]\nProblem: Missing X\n\nDebug Info:\n  message: Missing X")).toBe(true);
		});

		it("should render plain errors on one line", () => {
			expect(ErrorHelper.formatError(new Error("plain"))).toBe("\nError: plain");
		});
	});
});
