import { STEP_STATUS } from "@nock-provision/shared";
import type {
	ExecutionEnvironment,
	Logger,
	NodeRunner,
	Pipeline,
	Provisioner,
	ProvisionerConfig,
	RunMenu,
	StepContext,
} from "./types/index.js";
import { LoggerImpl } from "./logger/index.js";

/**
 * Provisions the machine once, then hands over to the run menu.
 */
export class ProvisionerImpl implements Provisioner {
	private readonly logger: Logger;

	constructor(
		private readonly config: ProvisionerConfig,
		private readonly pipeline: Pipeline,
		private readonly environment: ExecutionEnvironment,
		private readonly menu: RunMenu,
		private readonly nodeRunner: NodeRunner,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("provisioner");
	}

	async start(): Promise<number> {
		this.logger.info(`Provisioning ${this.config.installDir}`);

		const context: StepContext = { config: this.config, environment: this.environment };
		const report = await this.pipeline.run(context);
		for (const change of this.environment.history()) {
			this.logger.debug(`Environment: ${change.key}=${change.next} (${change.reason})`);
		}

		if (!report.ok) {
			const step = report.failed?.step ?? "unknown step";
			this.logger.error(`Provisioning failed at ${step}`);
			return 1;
		}

		const warnings = report.results.filter(result => result.status === STEP_STATUS.WARNED).length;
		this.logger.info(`Provisioning complete (${report.results.length} steps, ${warnings} warning(s))`);

		if (this.config.action !== null) {
			await this.nodeRunner.run(this.config.action);
			return 0;
		}
		if (!this.config.menu) {
			return 0;
		}
		return this.menu.run();
	}
}
