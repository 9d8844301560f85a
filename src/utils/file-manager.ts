import { promises as fs } from "fs";
import path from "path";
import { FormatFactory } from "../core/adapters/factory.js";
import ErrorHelper from "./error-helper.js";

export interface FileOptions {
	atomic?: boolean;
	createMissingDirs?: boolean;
	backupFiles?: boolean;
	backupDir?: string;
	encoding?: BufferEncoding;
	indent?: number;
	/** Explicit format override (json, yaml, po) */
	format?: string;
}

type ResolvedFileOptions = Required<Omit<FileOptions, "format">> & Pick<FileOptions, "format">;

const errnoCode = (error: unknown): string | undefined =>
	typeof error === "object" && error !== null && "code" in error && typeof error.code === "string"
		? error.code
		: undefined;

/**
 * FileManager - asynchronous file operations with atomic writes.
 * Structured formats go through the adapter matching the file extension.
 */
class FileManager {
	static defaultOptions: ResolvedFileOptions = {
		atomic: true,
		createMissingDirs: true,
		backupFiles: false,
		backupDir: "./backups",
		encoding: "utf8",
		indent: 2,
	};

	private static options: ResolvedFileOptions | null = null;

	static configure(options: FileOptions): void {
		this.options = {
			...this.defaultOptions,
			...options,
		};
	}

	static getConfig(): ResolvedFileOptions {
		return this.options ?? this.defaultOptions;
	}

	/**
	 * Read a text file.
	 * @throws ERR_FILE_NOT_FOUND when the file does not exist
	 */
	static async readText(filePath: string, options: FileOptions = {}): Promise<string> {
		const config = { ...this.getConfig(), ...options };

		try {
			return await fs.readFile(filePath, { encoding: config.encoding });
		} catch (error) {
			if (errnoCode(error) === "ENOENT") {
				throw ErrorHelper.fileNotFoundError(filePath);
			}
			throw new Error(`File read error (${filePath}): ${ErrorHelper.getMessage(error)}`);
		}
	}

	/**
	 * Read and parse a structured file (JSON, YAML, PO).
	 */
	static async readFile(filePath: string, options: FileOptions = {}): Promise<Record<string, unknown>> {
		const content = await this.readText(filePath, options);
		const adapter = options.format
			? FormatFactory.getAdapterByFormat(options.format)
			: FormatFactory.getAdapter(filePath);

		try {
			return await adapter.parse(content);
		} catch (error) {
			throw new Error(`File read error (${filePath}): ${ErrorHelper.getMessage(error)}`);
		}
	}

	/**
	 * Serialize data with the matching adapter and write it.
	 */
	static async writeFile(
		filePath: string,
		data: Record<string, unknown>,
		options: FileOptions = {}
	): Promise<void> {
		const config = { ...this.getConfig(), ...options };
		const adapter = options.format
			? FormatFactory.getAdapterByFormat(options.format)
			: FormatFactory.getAdapter(filePath);

		const content = await adapter.serialize(data, { indent: config.indent });
		await this.writeText(filePath, content, options);
	}

	/**
	 * Write text, through a temp file and rename when `atomic` is set.
	 */
	static async writeText(filePath: string, content: string, options: FileOptions = {}): Promise<void> {
		const config = { ...this.getConfig(), ...options };

		try {
			if (config.createMissingDirs) {
				await this.ensureDir(path.dirname(filePath));
			}

			if (config.backupFiles) {
				await this.backup(filePath, config.backupDir);
			}

			if (!config.atomic) {
				await fs.writeFile(filePath, content, { encoding: config.encoding });
				return;
			}

			const tempFile = this.tempFilePath(filePath);
			try {
				await fs.writeFile(tempFile, content, { encoding: config.encoding });
				await fs.rename(tempFile, filePath);
			} catch (error) {
				await fs.rm(tempFile, { force: true });
				throw new Error(`Atomic write failed: ${ErrorHelper.getMessage(error)}`);
			}
		} catch (error) {
			throw new Error(`File write error (${filePath}): ${ErrorHelper.getMessage(error)}`);
		}
	}

	static async ensureDir(dir: string): Promise<void> {
		await fs.mkdir(dir, { recursive: true });
	}

	static async exists(filePath: string): Promise<boolean> {
		try {
			await fs.access(filePath);
			return true;
		} catch {
			return false;
		}
	}

	/**
	 * List files under a directory, optionally descending into subdirectories.
	 * Paths are returned sorted.
	 */
	static async listFiles(
		dirPath: string,
		options: { recursive?: boolean; filter?: (filePath: string) => boolean } = {}
	): Promise<string[]> {
		const entries = await fs.readdir(dirPath, { withFileTypes: true });
		const files: string[] = [];

		for (const entry of entries) {
			const fullPath = path.join(dirPath, entry.name);
			if (entry.isDirectory() && options.recursive) {
				files.push(...(await this.listFiles(fullPath, options)));
			} else if (entry.isFile() && (!options.filter || options.filter(fullPath))) {
				files.push(fullPath);
			}
		}

		return files.sort();
	}

	private static async backup(filePath: string, backupDir: string): Promise<void> {
		if (!(await this.exists(filePath))) return;

		await this.ensureDir(backupDir);
		const backupPath = path.join(backupDir, `${path.basename(filePath)}.${Date.now()}.bak`);
		await fs.copyFile(filePath, backupPath);
	}

	private static tempFilePath(filePath: string): string {
		const random = Math.random().toString(36).substring(2, 8);
		return `${filePath}.tmp.${Date.now()}.${random}`;
	}
}

export { FileManager };
export default FileManager;
