import { NODE_BINARY, RUN_MODE, type RunMode } from "@nock-provision/shared";
import type { NodeInvocation, ProvisionerConfig } from "../types/index.js";
import { formatCommandLine } from "../utils/index.js";

/**
 * libp2p multiaddr the node binds its QUIC transport to.
 */
export function buildBindAddress(publicIp: string, peerPort: number): string {
	return `/ip4/${publicIp}/udp/${peerPort}/quic-v1`;
}

export function buildNodeInvocation(
	config: Pick<ProvisionerConfig, "installDir" | "publicIp" | "peerPort">,
	mode: RunMode,
	env: Record<string, string>,
): NodeInvocation {
	const args = ["--bind", buildBindAddress(config.publicIp, config.peerPort)];
	if (mode === RUN_MODE.MINER) {
		args.push("--mine");
	}
	return {
		command: NODE_BINARY,
		args,
		cwd: config.installDir,
		env,
	};
}

export function formatNodeInvocation(invocation: Pick<NodeInvocation, "command" | "args">): string {
	return formatCommandLine(invocation.command, invocation.args);
}
