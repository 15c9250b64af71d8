/**
 * Injection tokens (identifiers) for all dependencies in the provisioner package.
 */

import type {
	CommandRunner,
	EnvFileStore,
	EnvironmentProbe,
	ExecutionEnvironment,
	Logger,
	NodeRunner,
	Pipeline,
	PortProbe,
	Prompt,
	Provisioner,
	ProvisionerConfig,
	RunMenu,
	Step,
	WalletClient,
} from "../types/index.js";

/**
 * Token type for identifying dependencies in the container.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration & Logging
// ============================================================================

export const CONFIG = createToken<ProvisionerConfig>("ProvisionerConfig");

export const LOGGER = createToken<Logger>("Logger");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

// ============================================================================
// Infrastructure
// ============================================================================

export const COMMAND_RUNNER = createToken<CommandRunner>("CommandRunner");
export const EXECUTION_ENVIRONMENT = createToken<ExecutionEnvironment>("ExecutionEnvironment");
export const ENVIRONMENT_PROBE = createToken<EnvironmentProbe>("EnvironmentProbe");
export const ENV_FILE_STORE = createToken<EnvFileStore>("EnvFileStore");
export const WALLET_CLIENT = createToken<WalletClient>("WalletClient");
export const PORT_PROBE = createToken<PortProbe>("PortProbe");
export const PROMPT = createToken<Prompt>("Prompt");

// ============================================================================
// Provisioning
// ============================================================================

/**
 * Token for the ordered step list.
 */
export const STEPS = createToken<readonly Step[]>("Steps");
export const PIPELINE = createToken<Pipeline>("Pipeline");
export const NODE_RUNNER = createToken<NodeRunner>("NodeRunner");
export const RUN_MENU = createToken<RunMenu>("RunMenu");
export const PROVISIONER = createToken<Provisioner>("Provisioner");

export const TOKENS = {
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	COMMAND_RUNNER,
	EXECUTION_ENVIRONMENT,
	ENVIRONMENT_PROBE,
	ENV_FILE_STORE,
	WALLET_CLIENT,
	PORT_PROBE,
	PROMPT,
	STEPS,
	PIPELINE,
	NODE_RUNNER,
	RUN_MENU,
	PROVISIONER,
} as const;
