/**
 * Dependency Injection module exports.
 */

import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	COMMAND_RUNNER,
	CONFIG,
	ENVIRONMENT_PROBE,
	ENV_FILE_STORE,
	EXECUTION_ENVIRONMENT,
	LOGGER,
	LOGGER_FACTORY,
	NODE_RUNNER,
	PIPELINE,
	PORT_PROBE,
	PROMPT,
	PROVISIONER,
	RUN_MENU,
	STEPS,
	TOKENS,
	WALLET_CLIENT,
	createToken,
	type LoggerFactory,
	type Token,
} from "./tokens.js";
export { configureContainer, createProvisioner, createProvisionerContainer } from "./composition-root.js";
