/**
 * Environment variable parsing utilities for provisioner configuration.
 */

import type { StepName } from "@nock-provision/shared";
import { parseStepList } from "./step-list.js";

export function parseEnvNumber(key: string): number | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	const parsed = parseInt(value, 10);
	return isNaN(parsed) ? undefined : parsed;
}

export function parseEnvBoolean(key: string): boolean | undefined {
	const value = process.env[key]?.trim().toLowerCase();
	if (value === "true" || value === "1") {
		return true;
	}
	if (value === "false" || value === "0") {
		return false;
	}
	return undefined;
}

export interface ParsedEnv {
	homeDir?: string;
	installDir?: string;
	repoUrl?: string;
	publicIp?: string;
	peerPort?: number;
	portCheckHost?: string;
	portCheckTimeoutMs?: number;
	useSudo?: boolean;
	skipSteps?: StepName[];
	rejected: string[];
}

export function parseEnvVars(): ParsedEnv {
	const rejected: string[] = [];
	let skipSteps: StepName[] | undefined;

	const skipValue = process.env.NOCK_SKIP_STEPS;
	if (skipValue !== undefined) {
		const { steps, unknown } = parseStepList(skipValue);
		skipSteps = steps;
		rejected.push(...unknown.map(name => `NOCK_SKIP_STEPS=${name}`));
	}

	return {
		homeDir: process.env.HOME || undefined,
		installDir: process.env.NOCK_INSTALL_DIR,
		repoUrl: process.env.NOCK_REPO_URL,
		publicIp: process.env.NOCK_PUBLIC_IP,
		peerPort: parseEnvNumber("NOCK_PEER_PORT"),
		portCheckHost: process.env.NOCK_PORT_CHECK_HOST,
		portCheckTimeoutMs: parseEnvNumber("NOCK_PORT_CHECK_TIMEOUT_MS"),
		useSudo: parseEnvBoolean("NOCK_USE_SUDO"),
		skipSteps,
		rejected,
	};
}
