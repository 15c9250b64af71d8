import * as path from "node:path";
import {
	BUILD_DRIVER_COMMAND,
	RUSTUP_INSTALL_URL,
	STEP_NAME,
	STEP_STATUS,
	TOOLCHAIN_COMMAND,
} from "@nock-provision/shared";
import type { CommandRunner, EnvironmentProbe, Logger, Step, StepContext, StepOutcome } from "../types/index.js";
import { ToolchainMissingError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";

/**
 * Shell pipeline that fetches and runs the rustup installer.
 * curl refuses anything but HTTPS with TLS 1.2 or newer.
 */
export function rustupInstallScript(url: string = RUSTUP_INSTALL_URL): string {
	return `curl --proto '=https' --tlsv1.2 -sSf ${url} | sh -s -- -y`;
}

/**
 * Installs the Rust toolchain, or updates it when already present.
 */
export class ToolchainStep implements Step {
	readonly name = STEP_NAME.TOOLCHAIN;
	private readonly logger: Logger;

	constructor(
		private readonly runner: CommandRunner,
		private readonly probe: EnvironmentProbe,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("toolchain");
	}

	async run(context: StepContext): Promise<StepOutcome> {
		const { config, environment } = context;
		const cargoBin = path.join(config.homeDir, ".cargo", "bin");

		// Same effect as sourcing ~/.cargo/env in the current shell
		environment.prependPath(cargoBin, "rust toolchain binaries");

		let action: string;
		if (await this.probe.hasCommand(TOOLCHAIN_COMMAND)) {
			this.logger.info(`${TOOLCHAIN_COMMAND} found, updating toolchain`);
			await this.runner.exec({
				command: TOOLCHAIN_COMMAND,
				args: ["update"],
				env: environment.variables(),
			});
			action = "Updated";
		} else {
			this.logger.info(`${TOOLCHAIN_COMMAND} not found, installing from ${RUSTUP_INSTALL_URL}`);
			await this.runner.exec({
				command: "bash",
				args: ["-o", "pipefail", "-c", rustupInstallScript()],
				env: environment.variables(),
			});
			action = "Installed";
		}

		if (!(await this.probe.hasCommand(BUILD_DRIVER_COMMAND))) {
			throw new ToolchainMissingError(BUILD_DRIVER_COMMAND);
		}

		return {
			status: STEP_STATUS.SUCCEEDED,
			message: `${action} Rust toolchain`,
		};
	}
}
