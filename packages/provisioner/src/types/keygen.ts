export type KeyParseError = "KEY_NOT_FOUND" | "EMPTY_KEY";

export type KeyParseResult =
	| { ok: true; publicKey: string }
	| { ok: false; error: KeyParseError };

/**
 * Wrapper around the external wallet executable.
 */
export interface WalletClient {
	/**
	 * Generate a new keypair. Output is shown to the operator as it is
	 * produced, so the seed phrase is visible, and returned for parsing.
	 */
	keygen(): Promise<string>;
}
