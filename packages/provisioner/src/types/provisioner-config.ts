import type { RunMode, StepName } from "@nock-provision/shared";

/**
 * Provisioner configuration threaded through every step.
 * Values are populated from CLI arguments, environment variables, or defaults.
 */
export interface ProvisionerConfig {
	/** Operator home directory; the toolchain installs below it */
	homeDir: string;
	/** Working copy of the upstream repository */
	installDir: string;
	repoUrl: string;
	/** Address advertised in the node's bind multiaddr */
	publicIp: string;
	peerPort: number;
	portCheckHost: string;
	portCheckTimeoutMs: number;
	/** Prefix package manager commands with sudo */
	useSudo: boolean;
	skipSteps: StepName[];
	/** Show the run menu after provisioning */
	menu: boolean;
	/** Run this mode once after provisioning instead of the menu */
	action: RunMode | null;
}
