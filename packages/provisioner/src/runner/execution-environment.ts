import * as path from "node:path";
import type { EnvChange, ExecutionEnvironment, Logger } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";

/**
 * Execution environment seeded from the provisioner's own process
 * environment. Replaces the shell habit of sourcing files into the
 * current session: every change is explicit and recorded.
 */
export class ExecutionEnvironmentImpl implements ExecutionEnvironment {
	private readonly values: Record<string, string> = {};
	private readonly changes: EnvChange[] = [];
	private readonly logger: Logger;

	constructor(base: NodeJS.ProcessEnv = process.env, logger?: Logger) {
		this.logger = logger ?? new LoggerImpl("environment");
		for (const [key, value] of Object.entries(base)) {
			if (value !== undefined) {
				this.values[key] = value;
			}
		}
	}

	variables(): Record<string, string> {
		return { ...this.values };
	}

	get(key: string): string | undefined {
		return this.values[key];
	}

	set(key: string, value: string, reason: string): void {
		const previous = this.values[key];
		if (previous === value) {
			return;
		}
		this.values[key] = value;
		this.changes.push({ key, previous, next: value, reason });
		this.logger.debug(`${key} updated: ${reason}`);
	}

	prependPath(dir: string, reason: string): void {
		const current = this.values.PATH ?? "";
		const entries = current === "" ? [] : current.split(path.delimiter);
		if (entries.includes(dir)) {
			return;
		}
		this.set("PATH", [dir, ...entries].join(path.delimiter), reason);
	}

	history(): readonly EnvChange[] {
		return this.changes;
	}
}
