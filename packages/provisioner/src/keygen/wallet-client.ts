import { WALLET_BINARY } from "@nock-provision/shared";
import type { CommandRunner, ExecutionEnvironment, WalletClient } from "../types/index.js";

/**
 * Invokes the wallet executable installed by the build.
 */
export class WalletClientImpl implements WalletClient {
	constructor(
		private readonly runner: CommandRunner,
		private readonly environment: ExecutionEnvironment,
		private readonly cwd: string,
	) {}

	async keygen(): Promise<string> {
		const outcome = await this.runner.exec({
			command: WALLET_BINARY,
			args: ["keygen"],
			cwd: this.cwd,
			env: this.environment.variables(),
			output: "tee",
		});
		return outcome.stdout;
	}
}
