import { ProvisionError } from "./provision-error.js";

/**
 * Thrown when a required command is still unresolvable after setup
 */
export class ToolchainMissingError extends ProvisionError {
	constructor(readonly command: string) {
		super(`Required command not found on PATH: ${command}`);
	}
}
