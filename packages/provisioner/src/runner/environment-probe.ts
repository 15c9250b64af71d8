import type { CommandRunner, EnvironmentProbe, ExecutionEnvironment } from "../types/index.js";

/**
 * Resolves commands with the POSIX `command -v` builtin, against the
 * PATH of the execution environment rather than the provisioner's own.
 */
export class EnvironmentProbeImpl implements EnvironmentProbe {
	constructor(
		private readonly runner: CommandRunner,
		private readonly environment: ExecutionEnvironment,
	) {}

	async hasCommand(command: string): Promise<boolean> {
		const outcome = await this.runner.run({
			command: "sh",
			args: ["-c", "command -v \"$1\"", "sh", command],
			env: this.environment.variables(),
			output: "capture",
		});
		return outcome.exitCode === 0;
	}
}
