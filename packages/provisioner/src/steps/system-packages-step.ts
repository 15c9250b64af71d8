import { STEP_NAME, STEP_STATUS, SYSTEM_PACKAGES } from "@nock-provision/shared";
import type { CommandRunner, EnvironmentProbe, Logger, Step, StepContext, StepOutcome } from "../types/index.js";
import { ToolchainMissingError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { privileged } from "./privileged.js";

const PACKAGE_MANAGER = "apt-get";
/** Keeps debconf and needrestart from stopping on dialogs */
const APT_ENV = { DEBIAN_FRONTEND: "noninteractive" };

/**
 * Upgrades OS packages and installs the native build dependencies.
 */
export class SystemPackagesStep implements Step {
	readonly name = STEP_NAME.SYSTEM_PACKAGES;
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		private readonly probe: EnvironmentProbe,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("system");
	}

	async run(context: StepContext): Promise<StepOutcome> {
		const { config, environment } = context;

		if (!(await this.probe.hasCommand(PACKAGE_MANAGER))) {
			throw new ToolchainMissingError(PACKAGE_MANAGER);
		}

		const env = { ...environment.variables(), ...APT_ENV };
		const invocations = [
			["update"],
			["upgrade", "-y"],
			["install", "-y", ...SYSTEM_PACKAGES],
		];

		this.logger.info(`Installing ${SYSTEM_PACKAGES.length} system packages`);
		for (const args of invocations) {
			await this.runner.exec({ ...privileged(PACKAGE_MANAGER, args, config.useSudo, APT_ENV), env });
		}

		return {
			status: STEP_STATUS.SUCCEEDED,
			message: `Installed ${SYSTEM_PACKAGES.join(", ")}`,
		};
	}
}
