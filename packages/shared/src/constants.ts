/**
 * Shared constants for the provisioner.
 *
 * Values describe the external Nockchain project this tool builds and runs.
 */

// =============================================================================
// Upstream Project
// =============================================================================

/** Upstream repository cloned into the install directory */
export const NOCKCHAIN_REPO_URL = "https://github.com/zorp-corp/nockchain";
/** Install directory name, relative to the operator's home directory */
export const DEFAULT_INSTALL_DIR_NAME = "nockchain";
/** Node executable installed by the build */
export const NODE_BINARY = "nockchain";
/** Wallet executable installed by the build */
export const WALLET_BINARY = "nockchain-wallet";

/**
 * Make targets of the upstream project, in the order they must run.
 */
export const BUILD_TARGETS = [
	"install-hoonc",
	"build",
	"install-nockchain-wallet",
	"install-nockchain",
] as const;

// =============================================================================
// Configuration File
// =============================================================================

/** Configuration file read by the node, inside the install directory */
export const ENV_FILE_NAME = ".env";
/** Template the configuration file is seeded from */
export const ENV_TEMPLATE_FILE_NAME = ".env_example";

/** Logging directives appended when the file has no RUST_LOG entry */
export const DEFAULT_RUST_LOG = "info,nockchain=info,nockchain_libp2p_io=info,libp2p=info,libp2p_quic=info";
export const DEFAULT_MINIMAL_LOG_FORMAT = "true";

// =============================================================================
// Network
// =============================================================================

/** UDP port the node uses for peering */
export const DEFAULT_PEER_PORT = 3006;
/** Address the node binds to when no public IP is configured */
export const DEFAULT_PUBLIC_IP = "0.0.0.0";
/** Host answering on every port, used for the reachability probe */
export const DEFAULT_PORT_CHECK_HOST = "portquiz.net";
export const DEFAULT_PORT_CHECK_TIMEOUT_MS = 5_000;

// =============================================================================
// System Packages & Toolchain
// =============================================================================

/** Native packages installed through apt-get */
export const SYSTEM_PACKAGES = [
	"curl",
	"git",
	"make",
	"clang",
	"llvm-dev",
	"libclang-dev",
	"pkg-config",
	"libssl-dev",
	"build-essential",
	"screen",
	"netcat-openbsd",
] as const;

/** Installer script for rustup; fetched over HTTPS with TLS 1.2 or newer only */
export const RUSTUP_INSTALL_URL = "https://sh.rustup.rs";
/** Primary toolchain command probed before installing */
export const TOOLCHAIN_COMMAND = "rustup";
/** Build driver that must resolve once the toolchain is installed */
export const BUILD_DRIVER_COMMAND = "cargo";
