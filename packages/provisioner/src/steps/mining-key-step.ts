import { ENV_KEY, STEP_NAME, STEP_STATUS } from "@nock-provision/shared";
import type { EnvFileStore, Logger, Step, StepContext, StepOutcome, WalletClient } from "../types/index.js";
import { KeyExtractionError } from "../errors/index.js";
import { parsePublicKey } from "../keygen/index.js";
import { LoggerImpl } from "../logger/index.js";

/**
 * Generates a mining keypair when the configuration has no public key.
 */
export class MiningKeyStep implements Step {
	readonly name = STEP_NAME.MINING_KEY;
	private readonly logger: Logger;

	constructor(
		private readonly envFile: EnvFileStore,
		private readonly wallet: WalletClient,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("mining-key");
	}

	async run(_context: StepContext): Promise<StepOutcome> {
		if (!this.envFile.needsMiningKey()) {
			return {
				status: STEP_STATUS.SKIPPED,
				message: `${ENV_KEY.MINING_PUBKEY} already set`,
			};
		}

		this.logger.info("Generating mining keypair");
		const output = await this.wallet.keygen();

		const parsed = parsePublicKey(output);
		if (!parsed.ok) {
			throw new KeyExtractionError(parsed.error);
		}

		this.envFile.setValue(ENV_KEY.MINING_PUBKEY, parsed.publicKey);
		this.logger.info(`Public key: ${parsed.publicKey}`);
		this.logger.warn("Write down the seed phrase printed above. It is not saved anywhere and cannot be recovered.");

		return {
			status: STEP_STATUS.SUCCEEDED,
			message: `${ENV_KEY.MINING_PUBKEY} set to ${parsed.publicKey}`,
		};
	}
}
