/**
 * Default configuration values for the provisioner.
 */

import * as os from "node:os";
import * as path from "node:path";
import {
	DEFAULT_INSTALL_DIR_NAME,
	DEFAULT_PEER_PORT,
	DEFAULT_PORT_CHECK_HOST,
	DEFAULT_PORT_CHECK_TIMEOUT_MS,
	DEFAULT_PUBLIC_IP,
	NOCKCHAIN_REPO_URL,
} from "@nock-provision/shared";
import type { ProvisionerConfig } from "../types/index.js";

function isRoot(): boolean {
	return process.getuid?.() === 0;
}

export function getDefaultConfig(homeDir: string = os.homedir()): ProvisionerConfig {
	return {
		homeDir,
		installDir: path.join(homeDir, DEFAULT_INSTALL_DIR_NAME),
		repoUrl: NOCKCHAIN_REPO_URL,
		publicIp: DEFAULT_PUBLIC_IP,
		peerPort: DEFAULT_PEER_PORT,
		portCheckHost: DEFAULT_PORT_CHECK_HOST,
		portCheckTimeoutMs: DEFAULT_PORT_CHECK_TIMEOUT_MS,
		useSudo: !isRoot(),
		skipSteps: [],
		menu: true,
		action: null,
	};
}
