import type { EnvVariables } from "@nock-provision/shared";

/**
 * Access to the node's KEY=VALUE configuration file.
 * Writes are atomic (temp file + rename).
 */
export interface EnvFileStore {
	getPath(): string;
	exists(): boolean;
	/** @throws EnvFileMissingError when the file does not exist */
	read(): string;
	write(content: string): void;
	/** Copy the template into place when the file is missing. Returns true when it copied. */
	seedFromTemplate(templatePath: string): boolean;
	/** Append RUST_LOG and MINIMAL_LOG_FORMAT defaults when RUST_LOG is absent. Returns true when it appended. */
	ensureLoggingDefaults(): boolean;
	needsMiningKey(): boolean;
	/** Replace every assignment of the key, or append one when absent. */
	setValue(key: string, value: string): void;
	loadVariables(): EnvVariables;
}
