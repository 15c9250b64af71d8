/**
 * CLI argument parsing for provisioner configuration.
 */

import { type RunMode, type StepName, isRunMode } from "@nock-provision/shared";
import { parseStepList } from "./step-list.js";

export interface ParsedArgs {
	installDir?: string;
	repoUrl?: string;
	publicIp?: string;
	peerPort?: number;
	portCheckHost?: string;
	portCheckTimeoutMs?: number;
	useSudo?: boolean;
	skipSteps?: StepName[];
	menu?: boolean;
	action?: RunMode;
	/** Values that were recognised as flags but could not be used */
	rejected: string[];
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = { rejected: [] };

	for (const arg of args) {
		if (arg.startsWith("--install-dir=")) {
			parsed.installDir = arg.slice("--install-dir=".length);
		} else if (arg.startsWith("--repo-url=")) {
			parsed.repoUrl = arg.slice("--repo-url=".length);
		} else if (arg.startsWith("--public-ip=")) {
			parsed.publicIp = arg.slice("--public-ip=".length);
		} else if (arg.startsWith("--peer-port=")) {
			const value = parseInt(arg.slice("--peer-port=".length), 10);
			if (!isNaN(value)) {
				parsed.peerPort = value;
			}
		} else if (arg.startsWith("--port-check-host=")) {
			parsed.portCheckHost = arg.slice("--port-check-host=".length);
		} else if (arg.startsWith("--port-check-timeout-ms=")) {
			const value = parseInt(arg.slice("--port-check-timeout-ms=".length), 10);
			if (!isNaN(value)) {
				parsed.portCheckTimeoutMs = value;
			}
		} else if (arg === "--no-sudo") {
			parsed.useSudo = false;
		} else if (arg.startsWith("--skip=")) {
			const { steps, unknown } = parseStepList(arg.slice("--skip=".length));
			parsed.skipSteps = steps;
			parsed.rejected.push(...unknown.map(name => `--skip=${name}`));
		} else if (arg === "--no-menu") {
			parsed.menu = false;
		} else if (arg.startsWith("--action=")) {
			const value = arg.slice("--action=".length);
			if (isRunMode(value)) {
				parsed.action = value;
			} else {
				parsed.rejected.push(arg);
			}
		}
	}

	return parsed;
}
