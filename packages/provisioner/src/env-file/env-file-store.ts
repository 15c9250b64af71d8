import * as fs from "node:fs";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import type { EnvVariables } from "@nock-provision/shared";
import type { EnvFileStore, Logger } from "../types/index.js";
import { EnvFileMissingError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import {
	isMiningKeyMissing,
	parseEnvFile,
	upsertAssignment,
	withLoggingDefaults,
} from "./env-file.js";

/**
 * File-backed configuration store.
 * Uses atomic writes (temp file + rename) so the node never reads a
 * half-written file.
 */
export class EnvFileStoreImpl implements EnvFileStore {
	private readonly logger: Logger;

	constructor(
		private readonly filePath: string,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("env-file");
	}

	getPath(): string {
		return this.filePath;
	}

	exists(): boolean {
		return fs.existsSync(this.filePath);
	}

	read(): string {
		if (!this.exists()) {
			throw new EnvFileMissingError(this.filePath);
		}
		return fs.readFileSync(this.filePath, "utf-8");
	}

	write(content: string): void {
		const tempPath = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${randomUUID()}.tmp`);

		try {
			fs.writeFileSync(tempPath, content, "utf-8");
			fs.renameSync(tempPath, this.filePath);
			this.logger.debug(`Wrote ${this.filePath}`);
		} catch (err) {
			if (fs.existsSync(tempPath)) {
				fs.unlinkSync(tempPath);
			}
			throw err;
		}
	}

	seedFromTemplate(templatePath: string): boolean {
		if (this.exists()) {
			return false;
		}
		if (!fs.existsSync(templatePath)) {
			throw new EnvFileMissingError(templatePath);
		}
		this.write(fs.readFileSync(templatePath, "utf-8"));
		this.logger.info(`Created ${this.filePath} from ${path.basename(templatePath)}`);
		return true;
	}

	ensureLoggingDefaults(): boolean {
		const updated = withLoggingDefaults(this.read());
		if (updated === null) {
			return false;
		}
		this.write(updated);
		this.logger.info("Added default logging options");
		return true;
	}

	needsMiningKey(): boolean {
		return isMiningKeyMissing(this.read());
	}

	setValue(key: string, value: string): void {
		this.write(upsertAssignment(this.read(), key, value));
	}

	loadVariables(): EnvVariables {
		return parseEnvFile(this.read());
	}
}
