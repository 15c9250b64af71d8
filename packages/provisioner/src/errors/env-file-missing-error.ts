import { ProvisionError } from "./provision-error.js";

/**
 * Thrown when the configuration file, or its template, does not exist
 */
export class EnvFileMissingError extends ProvisionError {
	constructor(readonly filePath: string) {
		super(`Configuration file not found: ${filePath}`);
	}
}
