import { ProvisionError } from "./provision-error.js";

/**
 * Thrown when an external command cannot be started at all
 */
export class CommandLaunchError extends ProvisionError {
	constructor(
		readonly commandLine: string,
		cause: string,
	) {
		super(`Could not start ${commandLine}: ${cause}`, 127);
	}
}
