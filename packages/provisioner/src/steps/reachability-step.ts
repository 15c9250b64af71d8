import { STEP_NAME, STEP_STATUS } from "@nock-provision/shared";
import type { Logger, PortProbe, Step, StepContext, StepOutcome } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";

/**
 * Advisory check of the peer port. Never fails the pipeline.
 */
export class ReachabilityStep implements Step {
	readonly name = STEP_NAME.REACHABILITY;
	private readonly logger: Logger;

	constructor(
		private readonly portProbe: PortProbe,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("reachability");
	}

	async run(context: StepContext): Promise<StepOutcome> {
		const { portCheckHost, peerPort, portCheckTimeoutMs } = context.config;

		let detail: string;
		try {
			const outcome = await this.portProbe.probe(portCheckHost, peerPort, portCheckTimeoutMs);
			if (outcome.reachable) {
				this.logger.info(`UDP port ${peerPort} looks reachable (${outcome.detail})`);
				return {
					status: STEP_STATUS.SUCCEEDED,
					message: `UDP port ${peerPort} reachable via ${portCheckHost}`,
				};
			}
			detail = outcome.detail;
		} catch (err) {
			detail = formatError(err);
		}

		this.logger.warn(`UDP port ${peerPort} may not be reachable: ${detail}`);
		this.logger.warn(`Open it in the firewall: sudo ufw allow ${peerPort}/udp`);
		this.logger.warn(`Behind NAT, forward UDP ${peerPort} on the router to this machine`);

		return {
			status: STEP_STATUS.WARNED,
			message: `UDP port ${peerPort} not confirmed reachable: ${detail}`,
		};
	}
}
