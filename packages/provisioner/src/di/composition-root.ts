/**
 * Composition root for the provisioner package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import * as path from "node:path";
import { ENV_FILE_NAME } from "@nock-provision/shared";
import type { Provisioner, ProvisionerConfig } from "../types/index.js";
import { EnvFileStoreImpl } from "../env-file/index.js";
import { WalletClientImpl } from "../keygen/index.js";
import { LoggerImpl } from "../logger/index.js";
import { NodeRunnerImpl, ReadlinePrompt, RunMenuImpl } from "../menu/index.js";
import { UdpPortProbe } from "../network/index.js";
import { PipelineImpl } from "../pipeline.js";
import { ProvisionerImpl } from "../provisioner.js";
import { CommandRunnerImpl, EnvironmentProbeImpl, ExecutionEnvironmentImpl } from "../runner/index.js";
import {
	BuildStep,
	MiningKeyStep,
	ReachabilityStep,
	SourceSyncStep,
	SystemPackagesStep,
	ToolchainStep,
} from "../steps/index.js";
import { type Container, createContainer } from "./container.js";
import {
	COMMAND_RUNNER,
	CONFIG,
	ENVIRONMENT_PROBE,
	ENV_FILE_STORE,
	EXECUTION_ENVIRONMENT,
	LOGGER,
	LOGGER_FACTORY,
	type LoggerFactory,
	NODE_RUNNER,
	PIPELINE,
	PORT_PROBE,
	PROMPT,
	PROVISIONER,
	RUN_MENU,
	STEPS,
	WALLET_CLIENT,
} from "./tokens.js";

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(container: Container, config: ProvisionerConfig): void {
	container.instance(CONFIG, config);

	container.singleton<LoggerFactory>(LOGGER_FACTORY, () => {
		return (prefix: string) => new LoggerImpl(prefix);
	});

	container.singleton(LOGGER, (c: Container) => c.resolve(LOGGER_FACTORY)("provisioner"));

	container.singleton(COMMAND_RUNNER, (c: Container) => {
		return new CommandRunnerImpl(c.resolve(LOGGER_FACTORY)("runner"));
	});

	container.singleton(EXECUTION_ENVIRONMENT, (c: Container) => {
		return new ExecutionEnvironmentImpl(process.env, c.resolve(LOGGER_FACTORY)("environment"));
	});

	container.singleton(ENVIRONMENT_PROBE, (c: Container) => {
		return new EnvironmentProbeImpl(c.resolve(COMMAND_RUNNER), c.resolve(EXECUTION_ENVIRONMENT));
	});

	container.singleton(ENV_FILE_STORE, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		return new EnvFileStoreImpl(path.join(cfg.installDir, ENV_FILE_NAME), c.resolve(LOGGER_FACTORY)("env-file"));
	});

	container.singleton(WALLET_CLIENT, (c: Container) => {
		return new WalletClientImpl(c.resolve(COMMAND_RUNNER), c.resolve(EXECUTION_ENVIRONMENT), c.resolve(CONFIG).installDir);
	});

	container.singleton(PORT_PROBE, (c: Container) => new UdpPortProbe(c.resolve(LOGGER_FACTORY)("port-probe")));

	container.singleton(PROMPT, () => new ReadlinePrompt());

	// Build precedes key generation: the wallet binary is a build output
	container.singleton(STEPS, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		const runner = c.resolve(COMMAND_RUNNER);
		const probe = c.resolve(ENVIRONMENT_PROBE);
		const envFile = c.resolve(ENV_FILE_STORE);
		return [
			new SystemPackagesStep(runner, probe, factory("system")),
			new ToolchainStep(runner, probe, factory("toolchain")),
			new SourceSyncStep(runner, envFile, factory("source")),
			new BuildStep(runner, factory("build")),
			new MiningKeyStep(envFile, c.resolve(WALLET_CLIENT), factory("mining-key")),
			new ReachabilityStep(c.resolve(PORT_PROBE), factory("reachability")),
		];
	});

	container.singleton(PIPELINE, (c: Container) => {
		return new PipelineImpl(c.resolve(STEPS), c.resolve(LOGGER_FACTORY)("pipeline"));
	});

	container.singleton(NODE_RUNNER, (c: Container) => {
		return new NodeRunnerImpl(
			c.resolve(CONFIG),
			c.resolve(COMMAND_RUNNER),
			c.resolve(EXECUTION_ENVIRONMENT),
			c.resolve(ENV_FILE_STORE),
			c.resolve(LOGGER_FACTORY)("node"),
		);
	});

	container.singleton(RUN_MENU, (c: Container) => {
		return new RunMenuImpl(c.resolve(PROMPT), c.resolve(NODE_RUNNER), c.resolve(LOGGER_FACTORY)("menu"));
	});

	container.singleton(PROVISIONER, (c: Container) => {
		return new ProvisionerImpl(
			c.resolve(CONFIG),
			c.resolve(PIPELINE),
			c.resolve(EXECUTION_ENVIRONMENT),
			c.resolve(RUN_MENU),
			c.resolve(NODE_RUNNER),
			c.resolve(LOGGER),
		);
	});
}

export function createProvisionerContainer(config: ProvisionerConfig): Container {
	const container = createContainer();
	configureContainer(container, config);
	return container;
}

export function createProvisioner(config: ProvisionerConfig): Provisioner {
	return createProvisionerContainer(config).resolve(PROVISIONER);
}
