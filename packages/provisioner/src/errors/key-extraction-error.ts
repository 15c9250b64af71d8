import type { KeyParseError } from "../types/index.js";
import { ProvisionError } from "./provision-error.js";

const REASONS: Record<KeyParseError, string> = {
	KEY_NOT_FOUND: "no line containing \"Public Key\" in keygen output",
	EMPTY_KEY: "the \"Public Key\" line carries no value",
};

/**
 * Thrown when the public key cannot be read from keygen output.
 * The operator must inspect the wallet output manually.
 */
export class KeyExtractionError extends ProvisionError {
	constructor(readonly reason: KeyParseError) {
		super(`Failed to extract public key: ${REASONS[reason]}`);
	}
}
