export interface ProbeOutcome {
	reachable: boolean;
	detail: string;
}

/**
 * Reachability probe for a UDP port on a remote host.
 */
export interface PortProbe {
	probe(host: string, port: number, timeoutMs: number): Promise<ProbeOutcome>;
}
