/**
 * Provisioner package public API
 */

// Top level
export { ProvisionerImpl } from "./provisioner.js";
export { PipelineImpl } from "./pipeline.js";

// Configuration
export { loadConfig } from "./config/index.js";

// Components
export { LoggerImpl, setLogLevel } from "./logger/index.js";
export { CommandRunnerImpl, EnvironmentProbeImpl, ExecutionEnvironmentImpl } from "./runner/index.js";
export { EnvFileStoreImpl, parseEnvFile } from "./env-file/index.js";
export { WalletClientImpl, parsePublicKey } from "./keygen/index.js";
export { UdpPortProbe } from "./network/index.js";
export {
	BuildStep,
	MiningKeyStep,
	ReachabilityStep,
	SourceSyncStep,
	SystemPackagesStep,
	ToolchainStep,
} from "./steps/index.js";
export {
	NodeRunnerImpl,
	ReadlinePrompt,
	RunMenuImpl,
	buildNodeInvocation,
	formatNodeInvocation,
	parseMenuInput,
	transition,
} from "./menu/index.js";

// Errors
export {
	CommandFailedError,
	CommandLaunchError,
	EnvFileMissingError,
	KeyExtractionError,
	MenuTransitionError,
	ProvisionError,
	ToolchainMissingError,
} from "./errors/index.js";

// Dependency Injection
export {
	ContainerImpl,
	TOKENS,
	configureContainer,
	createContainer,
	createProvisioner,
	createProvisionerContainer,
	createToken,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, Token } from "./di/index.js";

// Interface types
export type * from "./types/index.js";
