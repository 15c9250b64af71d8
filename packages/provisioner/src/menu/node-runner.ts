import type { RunMode } from "@nock-provision/shared";
import type {
	CommandRunner,
	EnvFileStore,
	ExecutionEnvironment,
	Logger,
	NodeRunOutcome,
	NodeRunner,
	ProvisionerConfig,
} from "../types/index.js";
import { CommandFailedError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { buildNodeInvocation, formatNodeInvocation } from "./node-command.js";

/**
 * Runs the node in the foreground with the configuration file loaded
 * into its environment.
 */
export class NodeRunnerImpl implements NodeRunner {
	private readonly logger: Logger;

	constructor(
		private readonly config: ProvisionerConfig,
		private readonly runner: CommandRunner,
		private readonly environment: ExecutionEnvironment,
		private readonly envFile: EnvFileStore,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("node");
	}

	async run(mode: RunMode): Promise<NodeRunOutcome> {
		const env = { ...this.environment.variables(), ...this.envFile.loadVariables() };
		const invocation = buildNodeInvocation(this.config, mode, env);
		const commandLine = formatNodeInvocation(invocation);

		this.logger.info(`Starting ${mode}: ${commandLine}`);

		// Ctrl-C reaches the whole foreground process group; stop it from
		// killing the menu so control returns here once the node exits.
		const onInterrupt = (): void => {
			this.logger.info("Interrupt received, waiting for the node to exit");
		};
		process.on("SIGINT", onInterrupt);

		let outcome: NodeRunOutcome;
		try {
			const { exitCode, signal } = await this.runner.run(invocation);
			outcome = { exitCode, signal };
		} finally {
			process.off("SIGINT", onInterrupt);
		}

		if (outcome.exitCode !== null && outcome.exitCode !== 0) {
			throw new CommandFailedError(commandLine, outcome.exitCode);
		}

		this.logger.info(outcome.signal !== null
			? `${mode} stopped by ${outcome.signal}`
			: `${mode} exited`);
		return outcome;
	}
}
