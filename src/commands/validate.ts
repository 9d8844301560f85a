import ValidationService, { type ValidationFormat, type ValidationReport } from "../services/validation-service.js";
import { FileManager } from "../utils/file-manager.js";
import ErrorHelper from "../utils/error-helper.js";
import Logger, { getLogger } from "../utils/logger.js";

export interface ValidateOptions {
	directory: string;
	format: ValidationFormat;
}

/**
 * `validate`: check placeholder consistency of translated files.
 */
class ValidateCommand {
	private service: ValidationService;
	private logger: Logger;

	constructor(service: ValidationService = new ValidationService(), logger?: Logger) {
		this.service = service;
		this.logger = logger ?? getLogger();
	}

	/**
	 * @throws ERR_FILE_NOT_FOUND when the directory does not exist
	 */
	async run(options: ValidateOptions): Promise<ValidationReport> {
		if (!(await FileManager.exists(options.directory))) {
			throw ErrorHelper.fileNotFoundError(options.directory);
		}

		await this.logger.info(`Validating translation files in ${options.directory}`);
		await this.logger.info(`Format filter: ${options.format}`);

		const report = await this.service.validateDirectory(options.directory, options.format);
		console.log(this.service.formatReport(report));
		return report;
	}
}

export default ValidateCommand;
