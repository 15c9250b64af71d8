/**
 * Keys of the node's configuration file that the provisioner reads or writes.
 */
export const ENV_KEY = {
	RUST_LOG: "RUST_LOG",
	MINIMAL_LOG_FORMAT: "MINIMAL_LOG_FORMAT",
	MINING_PUBKEY: "MINING_PUBKEY",
} as const;

/**
 * Variables loaded from a configuration file, in file order.
 */
export type EnvVariables = Record<string, string>;
