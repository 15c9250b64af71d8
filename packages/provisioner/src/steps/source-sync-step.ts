import * as fs from "node:fs";
import * as path from "node:path";
import { ENV_TEMPLATE_FILE_NAME, STEP_NAME, STEP_STATUS } from "@nock-provision/shared";
import type { CommandRunner, EnvFileStore, Logger, Step, StepContext, StepOutcome } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";

/**
 * Clones or updates the upstream repository, then makes sure the
 * configuration file exists and carries logging defaults.
 */
export class SourceSyncStep implements Step {
	readonly name = STEP_NAME.SOURCE_SYNC;
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		private readonly envFile: EnvFileStore,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("source");
	}

	async run(context: StepContext): Promise<StepOutcome> {
		const { config, environment } = context;
		const notes: string[] = [];

		if (fs.existsSync(config.installDir)) {
			this.logger.info(`${config.installDir} exists, pulling latest changes`);
			await this.runner.exec({
				command: "git",
				args: ["pull"],
				cwd: config.installDir,
				env: environment.variables(),
			});
			notes.push(`Updated ${config.installDir}`);
		} else {
			this.logger.info(`Cloning ${config.repoUrl}`);
			await this.runner.exec({
				command: "git",
				args: ["clone", config.repoUrl, config.installDir],
				env: environment.variables(),
			});
			notes.push(`Cloned into ${config.installDir}`);
		}

		if (this.envFile.seedFromTemplate(path.join(config.installDir, ENV_TEMPLATE_FILE_NAME))) {
			notes.push(`seeded ${path.basename(this.envFile.getPath())}`);
		}
		if (this.envFile.ensureLoggingDefaults()) {
			notes.push("added logging defaults");
		}

		return {
			status: STEP_STATUS.SUCCEEDED,
			message: notes.join(", "),
		};
	}
}
