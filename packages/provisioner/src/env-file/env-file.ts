/**
 * Pure text operations on KEY=VALUE configuration files.
 */

import {
	DEFAULT_MINIMAL_LOG_FORMAT,
	DEFAULT_RUST_LOG,
	ENV_KEY,
	type EnvVariables,
} from "@nock-provision/shared";

const MINING_KEY_PRESENT = /^MINING_PUBKEY=/m;
// Trailing whitespace after "=" counts as a value here
const MINING_KEY_EMPTY = /^MINING_PUBKEY=$/m;

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Append lines, inserting a newline first when the text does not end with one.
 */
export function appendLines(content: string, lines: readonly string[]): string {
	const separator = content === "" || content.endsWith("\n") ? "" : "\n";
	return `${content}${separator}${lines.map(line => `${line}\n`).join("")}`;
}

/**
 * True when the text mentions a RUST_LOG assignment anywhere.
 * An empty value, or a commented-out line, still counts as present.
 */
export function hasRustLog(content: string): boolean {
	return content.includes(`${ENV_KEY.RUST_LOG}=`);
}

/**
 * Returns the text with logging defaults appended, or null when RUST_LOG is already present.
 */
export function withLoggingDefaults(content: string): string | null {
	if (hasRustLog(content)) {
		return null;
	}
	return appendLines(content, [
		`${ENV_KEY.RUST_LOG}=${DEFAULT_RUST_LOG}`,
		`${ENV_KEY.MINIMAL_LOG_FORMAT}=${DEFAULT_MINIMAL_LOG_FORMAT}`,
	]);
}

/**
 * A mining key is needed when MINING_PUBKEY is absent or assigned nothing.
 */
export function isMiningKeyMissing(content: string): boolean {
	return !MINING_KEY_PRESENT.test(content) || MINING_KEY_EMPTY.test(content);
}

/**
 * Replace the value of every `key=` line, or append `key=value` when there is none.
 */
export function upsertAssignment(content: string, key: string, value: string): string {
	const pattern = new RegExp(`^${escapeRegExp(key)}=.*$`, "gm");
	if (pattern.test(content)) {
		pattern.lastIndex = 0;
		return content.replace(pattern, () => `${key}=${value}`);
	}
	return appendLines(content, [`${key}=${value}`]);
}

function unquote(value: string): string {
	if (value.length >= 2) {
		const first = value[0];
		if ((first === "\"" || first === "'") && value.endsWith(first)) {
			return value.slice(1, -1);
		}
	}
	return value;
}

/**
 * Parse the file into variables the way `source` would for simple
 * assignments: comments and blank lines are skipped, an `export ` prefix
 * is dropped and one pair of surrounding quotes is removed.
 */
export function parseEnvFile(content: string): EnvVariables {
	const variables: EnvVariables = {};

	for (const rawLine of content.split(/\r?\n/)) {
		let line = rawLine.trim();
		if (line === "" || line.startsWith("#")) {
			continue;
		}
		if (line.startsWith("export ")) {
			line = line.slice("export ".length).trimStart();
		}
		const eq = line.indexOf("=");
		if (eq <= 0) {
			continue;
		}
		const key = line.slice(0, eq).trim();
		if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
			continue;
		}
		variables[key] = unquote(line.slice(eq + 1).trim());
	}

	return variables;
}
