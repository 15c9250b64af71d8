#!/usr/bin/env tsx
/**
 * CLI entry point for the provisioner.
 */

import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig } from "./config/index.js";
import { createProvisioner } from "./di/index.js";
import { ProvisionError } from "./errors/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

/**
 * True when `scriptPath` resolves to this file, following symlinks such as
 * the one npm places in node_modules/.bin.
 */
export function isMainModule(scriptPath: string | undefined = process.argv[1]): boolean {
	if (!scriptPath) {
		return false;
	}
	try {
		return realpathSync(scriptPath) === realpathSync(fileURLToPath(import.meta.url));
	} catch {
		return false;
	}
}

export async function main(args: string[]): Promise<number> {
	const config = loadConfig(args);
	const provisioner = createProvisioner(config);
	return provisioner.start();
}

if (isMainModule()) {
	main(process.argv.slice(2)).then((exitCode) => {
		process.exit(exitCode);
	}).catch((err: unknown) => {
		new LoggerImpl("cli").error(formatError(err));
		process.exit(err instanceof ProvisionError ? err.exitCode : 1);
	});
}
