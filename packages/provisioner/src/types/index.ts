/**
 * Type definitions for the provisioner package.
 */
export type { CommandOutcome, CommandRunner, CommandSpec, OutputMode } from "./command-runner.js";
export type { EnvFileStore } from "./env-file-store.js";
export type { EnvironmentProbe } from "./environment-probe.js";
export type { EnvChange, ExecutionEnvironment } from "./execution-environment.js";
export type { KeyParseError, KeyParseResult, WalletClient } from "./keygen.js";
export type { Logger } from "./logger.js";
export type {
	MenuEffect,
	MenuTransition,
	NodeInvocation,
	NodeRunOutcome,
	NodeRunner,
	Prompt,
	RunMenu,
} from "./menu.js";
export type { Pipeline } from "./pipeline.js";
export type { PortProbe, ProbeOutcome } from "./port-probe.js";
export type { ProvisionerConfig } from "./provisioner-config.js";
export type { Provisioner } from "./provisioner.js";
export type { Step, StepContext, StepOutcome } from "./step.js";
