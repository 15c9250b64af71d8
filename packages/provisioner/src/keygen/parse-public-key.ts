import type { KeyParseResult } from "../types/index.js";

export const PUBLIC_KEY_LABEL = "Public Key";

/**
 * Extract the public key from wallet keygen output.
 *
 * The first line containing the label wins. The key is the last
 * whitespace-delimited token after the label (a leading colon is dropped),
 * so both `Public Key: abc` and `New Public Key  abc` yield `abc`.
 */
export function parsePublicKey(output: string): KeyParseResult {
	const line = output.split(/\r?\n/).find(candidate => candidate.includes(PUBLIC_KEY_LABEL));
	if (line === undefined) {
		return { ok: false, error: "KEY_NOT_FOUND" };
	}

	const rest = line.slice(line.indexOf(PUBLIC_KEY_LABEL) + PUBLIC_KEY_LABEL.length).replace(/^\s*:/, "");
	const tokens = rest.trim().split(/\s+/).filter(token => token !== "");
	const publicKey = tokens[tokens.length - 1];

	if (publicKey === undefined) {
		return { ok: false, error: "EMPTY_KEY" };
	}
	return { ok: true, publicKey };
}
