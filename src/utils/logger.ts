/**
 * Console and file logging.
 * Console output is always on for errors and warnings; file logs are opt-in
 * through `saveErrorLogs` and rotate by size.
 */

import path from "path";
import { promises as fsPromises } from "fs";

export interface LogRotationConfig {
	enabled: boolean;
	maxFiles: number;
	maxSize: number;
}

export interface LoggerConfig {
	verbose?: boolean;
	diagnosticsLevel?: "minimal" | "normal" | "detailed";
	outputFormat?: "pretty" | "json" | "simple";
	saveErrorLogs?: boolean;
	logDirectory?: string;
	includeTimestamps?: boolean;
	logRotation?: {
		enabled?: boolean;
		maxFiles?: number;
		maxSize?: number | string;
	};
}

interface InternalLoggerConfig extends Required<Omit<LoggerConfig, "logRotation">> {
	logRotation: LogRotationConfig;
}

export type LogLevel = "error" | "warning" | "info" | "debug";

const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;

class Logger {
	public config: InternalLoggerConfig;
	public logFiles: Record<LogLevel, string>;
	public currentLogSizes: Partial<Record<LogLevel, number>>;
	private initialized: boolean;

	constructor(config: LoggerConfig = {}) {
		this.config = {
			verbose: config.verbose ?? false,
			diagnosticsLevel: config.diagnosticsLevel ?? "normal",
			outputFormat: config.outputFormat ?? "pretty",
			saveErrorLogs: config.saveErrorLogs ?? false,
			logDirectory: config.logDirectory ?? "./logs",
			includeTimestamps: config.includeTimestamps !== false,
			logRotation: {
				enabled: config.logRotation?.enabled !== false,
				maxFiles: config.logRotation?.maxFiles ?? 5,
				maxSize: this.parseSize(config.logRotation?.maxSize ?? "10MB"),
			},
		};

		this.logFiles = {
			error: path.join(this.config.logDirectory, "errors.log"),
			warning: path.join(this.config.logDirectory, "warnings.log"),
			info: path.join(this.config.logDirectory, "info.log"),
			debug: path.join(this.config.logDirectory, "debug.log"),
		};

		this.currentLogSizes = {};
		this.initialized = false;
	}

	/**
	 * Create the log directory and rotate oversized files. Runs once.
	 */
	async initialize(): Promise<void> {
		if (this.initialized) return;

		try {
			if (this.config.saveErrorLogs) {
				await fsPromises.mkdir(this.config.logDirectory, { recursive: true });

				if (this.config.logRotation.enabled) {
					await this.checkAndRotateLogs();
				}
			}

			this.initialized = true;
		} catch (error) {
			console.warn(`Logger initialization warning: ${describe(error)}`);
		}
	}

	/**
	 * Parse a size such as "10MB" into bytes.
	 */
	parseSize(size: number | string): number {
		if (typeof size === "number") return size;

		const units: Record<string, number> = {
			B: 1,
			KB: 1024,
			MB: 1024 * 1024,
			GB: 1024 * 1024 * 1024,
		};

		const match = size.match(/^(\d+(?:\.\d+)?)\s*([A-Z]+)$/i);
		if (!match) return DEFAULT_MAX_SIZE;

		const [, amount, unit] = match;
		return parseFloat(amount) * (units[unit.toUpperCase()] ?? 1);
	}

	async checkAndRotateLogs(): Promise<void> {
		for (const level of LEVELS) {
			const logPath = this.logFiles[level];
			try {
				const stats = await fsPromises.stat(logPath);
				this.currentLogSizes[level] = stats.size;

				if (stats.size >= this.config.logRotation.maxSize) {
					await this.rotateLog(level);
				}
			} catch (error) {
				if (errorCode(error) !== "ENOENT") {
					console.warn(`Log rotation failed for ${logPath}: ${describe(error)}`);
				}
				this.currentLogSizes[level] = 0;
			}
		}
	}

	/**
	 * Archive the current file of a level and prune old archives.
	 */
	async rotateLog(level: LogLevel): Promise<void> {
		const logPath = this.logFiles[level];
		try {
			const dir = path.dirname(logPath);
			const basename = path.basename(logPath, ".log");
			const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

			await fsPromises.rename(logPath, path.join(dir, `${basename}.${timestamp}.log`));
			await this.cleanupOldLogs(dir, basename);

			this.currentLogSizes[level] = 0;
		} catch (error) {
			console.warn(`Log rotation failed for ${logPath}: ${describe(error)}`);
		}
	}

	async cleanupOldLogs(dir: string, basename: string): Promise<void> {
		try {
			const files = await fsPromises.readdir(dir);
			const archives = await Promise.all(
				files
					.filter((file) => file.startsWith(`${basename}.`) && file.endsWith(".log"))
					.map(async (file) => {
						const filePath = path.join(dir, file);
						const stats = await fsPromises.stat(filePath);
						return { path: filePath, mtime: stats.mtime.getTime() };
					})
			);

			archives.sort((a, b) => b.mtime - a.mtime);

			for (const file of archives.slice(this.config.logRotation.maxFiles)) {
				await fsPromises.unlink(file.path);
			}
		} catch (error) {
			console.warn(`Cleanup old logs failed: ${describe(error)}`);
		}
	}

	formatMessage(level: LogLevel, message: string, data?: unknown): string {
		const timestamp = this.config.includeTimestamps ? new Date().toISOString() : null;

		switch (this.config.outputFormat) {
			case "json":
				return JSON.stringify({ timestamp, level, message, data: data ?? null });

			case "simple":
				return `[${level.toUpperCase()}] ${message}`;

			case "pretty":
			default: {
				const timeStr = timestamp ? `[${timestamp}] ` : "";
				const dataStr = data === undefined ? "" : `\n${JSON.stringify(data, null, 2)}`;
				return `${timeStr}[${level.toUpperCase()}] ${message}${dataStr}`;
			}
		}
	}

	async writeToFile(level: LogLevel, message: string, data?: unknown): Promise<void> {
		if (!this.config.saveErrorLogs) return;

		await this.initialize();

		const logPath = this.logFiles[level];
		try {
			const entry = `${this.formatMessage(level, message, data)}\n`;
			await fsPromises.appendFile(logPath, entry, "utf8");

			const size = (this.currentLogSizes[level] ?? 0) + Buffer.byteLength(entry);
			this.currentLogSizes[level] = size;

			if (this.config.logRotation.enabled && size >= this.config.logRotation.maxSize) {
				await this.rotateLog(level);
			}
		} catch (error) {
			console.warn(`Failed to write to log file: ${describe(error)}`);
		}
	}

	/**
	 * Plain console output, optionally only in verbose/debug mode.
	 */
	log(message: string, debugOnly = false): void {
		if (debugOnly && !this.config.verbose && !process.env.DEBUG) {
			return;
		}
		console.log(message);
	}

	async error(message: string, data?: unknown): Promise<void> {
		console.error(`ERROR: ${message}`);
		if (data !== undefined && this.config.verbose) {
			console.error(data);
		}
		await this.writeToFile("error", message, data);
	}

	async warn(message: string, data?: unknown): Promise<void> {
		console.warn(`WARNING: ${message}`);
		if (data !== undefined && this.config.verbose) {
			console.warn(data);
		}
		await this.writeToFile("warning", message, data);
	}

	async info(message: string, data?: unknown): Promise<void> {
		if (this.config.diagnosticsLevel !== "minimal" || this.config.verbose) {
			console.log(`INFO: ${message}`);
			if (data !== undefined && this.config.verbose) {
				console.log(data);
			}
		}
		await this.writeToFile("info", message, data);
	}

	async debug(message: string, data?: unknown): Promise<void> {
		if (this.config.verbose || this.config.diagnosticsLevel === "detailed" || process.env.DEBUG) {
			console.log(`DEBUG: ${message}`);
			if (data !== undefined) {
				console.log(data);
			}
		}
		await this.writeToFile("debug", message, data);
	}
}

const LEVELS: LogLevel[] = ["error", "warning", "info", "debug"];

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		return typeof error.code === "string" ? error.code : undefined;
	}
	return undefined;
}

let loggerInstance: Logger | null = null;

export function getLogger(config: LoggerConfig | null = null): Logger {
	if (!loggerInstance || config) {
		loggerInstance = new Logger(config ?? {});
	}
	return loggerInstance;
}

export default Logger;
