/**
 * Base class for provisioning errors.
 *
 * Carries the process exit code the CLI terminates with.
 */
export class ProvisionError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode: number = 1) {
		super(message);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}
