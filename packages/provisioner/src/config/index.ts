/**
 * Provisioner configuration module.
 *
 * Load configuration from CLI arguments, environment variables, and defaults.
 * Priority: CLI > Environment > Defaults
 */

import type { Logger, ProvisionerConfig } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { parseCliArgs } from "./cli-parser.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";

export function loadConfig(args: string[], logger: Logger = new LoggerImpl("config")): ProvisionerConfig {
	const cli = parseCliArgs(args);
	const env = parseEnvVars();
	const defaults = getDefaultConfig(env.homeDir);

	for (const value of [...cli.rejected, ...env.rejected]) {
		logger.warn(`Ignoring unrecognised value: ${value}`);
	}

	// Merge with priority: CLI > Environment > Defaults
	return {
		homeDir: defaults.homeDir,
		installDir: cli.installDir ?? env.installDir ?? defaults.installDir,
		repoUrl: cli.repoUrl ?? env.repoUrl ?? defaults.repoUrl,
		publicIp: cli.publicIp ?? env.publicIp ?? defaults.publicIp,
		peerPort: cli.peerPort ?? env.peerPort ?? defaults.peerPort,
		portCheckHost: cli.portCheckHost ?? env.portCheckHost ?? defaults.portCheckHost,
		portCheckTimeoutMs: cli.portCheckTimeoutMs ?? env.portCheckTimeoutMs ?? defaults.portCheckTimeoutMs,
		useSudo: cli.useSudo ?? env.useSudo ?? defaults.useSudo,
		skipSteps: cli.skipSteps ?? env.skipSteps ?? defaults.skipSteps,
		menu: cli.menu ?? defaults.menu,
		action: cli.action ?? defaults.action,
	};
}
