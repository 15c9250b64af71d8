import { BUILD_TARGETS, STEP_NAME, STEP_STATUS } from "@nock-provision/shared";
import type { CommandRunner, Logger, Step, StepContext, StepOutcome } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";

/**
 * Runs the upstream make targets in order. The first failing target
 * aborts the build.
 */
export class BuildStep implements Step {
	readonly name = STEP_NAME.BUILD;
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("build");
	}

	async run(context: StepContext): Promise<StepOutcome> {
		const { config, environment } = context;

		for (const [index, target] of BUILD_TARGETS.entries()) {
			this.logger.info(`[${index + 1}/${BUILD_TARGETS.length}] make ${target}`);
			await this.runner.exec({
				command: "make",
				args: [target],
				cwd: config.installDir,
				env: environment.variables(),
			});
		}

		return {
			status: STEP_STATUS.SUCCEEDED,
			message: `Built ${BUILD_TARGETS.join(", ")}`,
		};
	}
}
