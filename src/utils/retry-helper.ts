/**
 * Retry helper for API operations with exponential backoff
 */

import ErrorHelper, { isRecord } from "./error-helper.js";

export type RetryableErrorKind = "rate_limit" | "timeout" | "network" | "server" | "unknown";

export interface RetryOptions {
	retryableErrors?: RetryableErrorKind[];
	maxRetries?: number;
	initialDelay?: number;
	maxDelay?: number;
	context?: string;
	retryCondition?: (
		error: unknown,
		attempts: number,
		maxRetries: number
	) => boolean | Promise<boolean>;
}

const DEFAULT_RETRYABLE: RetryableErrorKind[] = [
	"rate_limit",
	"timeout",
	"network",
	"server",
	"unknown",
];

const statusOf = (error: unknown): number | undefined => {
	if (!isRecord(error)) return undefined;
	if (typeof error.status === "number") return error.status;
	if (isRecord(error.details) && typeof error.details.statusCode === "number") {
		return error.details.statusCode;
	}
	return ErrorHelper.describeHttpError(error).status;
};

const codeOf = (error: unknown): string | undefined =>
	isRecord(error) && typeof error.code === "string" ? error.code : undefined;

class RetryHelper {
	/**
	 * Run an operation, retrying retryable failures with jittered backoff.
	 * The last error is rethrown with the attempt count appended to its message.
	 */
	static async withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
		const retryableErrors = options.retryableErrors ?? DEFAULT_RETRYABLE;
		const maxRetries = options.maxRetries ?? 2;
		const initialDelay = options.initialDelay ?? 1000;
		const maxDelay = options.maxDelay ?? 10000;
		const context = options.context ?? "Operation";
		const retryCondition =
			options.retryCondition ??
			((error: unknown) => this.defaultRetryCondition(error, retryableErrors));

		let lastError: unknown = null;
		let attempts = 0;
		const startTime = Date.now();

		while (attempts <= maxRetries) {
			try {
				if (attempts > 0) {
					const delay = this.calculateBackoff(attempts, initialDelay, maxDelay);
					if (process.env.DEBUG) {
						console.log(
							`${context}: Retrying attempt ${attempts}/${maxRetries} after ${delay}ms delay`
						);
					}
					await this.delay(delay);
				}

				const result = await operation();

				if (attempts > 0 && process.env.DEBUG) {
					console.log(
						`${context}: Succeeded after ${attempts} retries (${Date.now() - startTime}ms)`
					);
				}

				return result;
			} catch (error) {
				attempts++;
				lastError = error;

				if (process.env.DEBUG) {
					const code = codeOf(error);
					console.warn(
						`Warning: ${context}: Error on attempt ${attempts}/${maxRetries + 1}: ${ErrorHelper.getMessage(error)}` +
							(code ? ` [${code}]` : "")
					);
				}

				const shouldRetry =
					attempts <= maxRetries && (await retryCondition(error, attempts, maxRetries));
				if (!shouldRetry) {
					break;
				}
			}
		}

		if (lastError instanceof Error) {
			const totalTime = Date.now() - startTime;
			lastError.message = `${lastError.message} (after ${attempts} attempts over ${totalTime}ms)`;
		}

		throw lastError;
	}

	/**
	 * Exponential backoff with full jitter.
	 */
	static calculateBackoff(attempt: number, initialDelay: number, maxDelay: number): number {
		const expBackoff = Math.min(maxDelay, initialDelay * Math.pow(2, attempt - 1));

		return Math.floor(Math.random() * expBackoff);
	}

	/**
	 * Decide whether a failure is worth another attempt.
	 */
	static defaultRetryCondition(
		error: unknown,
		retryableErrors: RetryableErrorKind[] = DEFAULT_RETRYABLE
	): boolean {
		const status = statusOf(error);
		const code = codeOf(error);
		const message = ErrorHelper.getMessage(error).toLowerCase();

		if (
			retryableErrors.includes("rate_limit") &&
			(status === 429 || code === ErrorHelper.ErrorCodes.API_RATE_LIMIT)
		) {
			return true;
		}

		if (
			retryableErrors.includes("timeout") &&
			(code === "ETIMEDOUT" ||
				code === "ECONNABORTED" ||
				code === ErrorHelper.ErrorCodes.API_TIMEOUT ||
				message.includes("timeout") ||
				message.includes("timed out"))
		) {
			return true;
		}

		if (
			retryableErrors.includes("network") &&
			(code === "ECONNRESET" ||
				code === "ECONNREFUSED" ||
				code === "ENOTFOUND" ||
				code === "ERR_NETWORK" ||
				code === ErrorHelper.ErrorCodes.NETWORK_ERROR ||
				message.includes("network") ||
				message.includes("connection"))
		) {
			return true;
		}

		if (retryableErrors.includes("server") && status !== undefined && status >= 500 && status < 600) {
			return true;
		}

		if (retryableErrors.includes("unknown") && status === undefined) {
			return code !== ErrorHelper.ErrorCodes.CONFIG_VALIDATION;
		}

		return false;
	}

	static delay(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, ms));
	}
}

export default RetryHelper;
