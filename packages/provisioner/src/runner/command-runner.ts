import { spawn } from "node:child_process";
import type { CommandOutcome, CommandRunner, CommandSpec, Logger } from "../types/index.js";
import { CommandFailedError, CommandLaunchError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatCommandLine, formatError } from "../utils/index.js";

/**
 * Write a chunk of teed output to the operator's terminal.
 */
export type OutputEcho = (chunk: string) => void;

const echoToStdout: OutputEcho = chunk => {
	process.stdout.write(chunk);
};

/**
 * Subprocess runner built on child_process.spawn.
 * Standard input and error are always inherited so prompts from
 * sudo, apt or the toolchain installer reach the operator.
 */
export class CommandRunnerImpl implements CommandRunner {
	private readonly logger: Logger;

	constructor(
		logger?: Logger,
		private readonly echo: OutputEcho = echoToStdout,
	) {
		this.logger = logger ?? new LoggerImpl("runner");
	}

	run(spec: CommandSpec): Promise<CommandOutcome> {
		const output = spec.output ?? "inherit";
		const commandLine = formatCommandLine(spec.command, spec.args);

		if (output === "capture") {
			this.logger.debug(`$ ${commandLine}`);
		} else {
			this.logger.info(`$ ${commandLine}`);
		}

		return new Promise<CommandOutcome>((resolve, reject) => {
			let settled = false;
			let stdout = "";

			const child = spawn(spec.command, spec.args, {
				cwd: spec.cwd,
				env: spec.env ?? process.env,
				stdio: ["inherit", output === "inherit" ? "inherit" : "pipe", "inherit"],
			});

			child.stdout?.setEncoding("utf-8");
			child.stdout?.on("data", (chunk: string) => {
				stdout += chunk;
				if (output === "tee") {
					this.echo(chunk);
				}
			});

			child.on("error", (err) => {
				if (settled) {
					return;
				}
				settled = true;
				reject(new CommandLaunchError(commandLine, formatError(err)));
			});

			child.on("close", (exitCode, signal) => {
				if (settled) {
					return;
				}
				settled = true;
				this.logger.debug(`${spec.command} exited (code=${exitCode}, signal=${signal})`);
				resolve({ exitCode, signal, stdout });
			});
		});
	}

	async exec(spec: CommandSpec): Promise<CommandOutcome> {
		const outcome = await this.run(spec);
		if (outcome.exitCode !== 0) {
			throw new CommandFailedError(formatCommandLine(spec.command, spec.args), outcome.exitCode, outcome.signal);
		}
		return outcome;
	}
}
