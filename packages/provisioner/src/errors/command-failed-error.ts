import { ProvisionError } from "./provision-error.js";

/**
 * Thrown when an external command exits with a non-zero status
 * or is terminated by a signal
 */
export class CommandFailedError extends ProvisionError {
	constructor(
		readonly commandLine: string,
		readonly commandExitCode: number | null,
		readonly signal: NodeJS.Signals | null = null,
	) {
		super(commandExitCode !== null
			? `Command failed with exit code ${commandExitCode}: ${commandLine}`
			: `Command terminated by ${signal ?? "unknown signal"}: ${commandLine}`);
	}
}
