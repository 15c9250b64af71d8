/**
 * Top-level flow: provisioning pipeline, then the run menu.
 */
export interface Provisioner {
	/** Resolves the process exit code. */
	start(): Promise<number>;
}
