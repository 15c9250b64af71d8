import { type PipelineReport, STEP_STATUS, type StepResult } from "@nock-provision/shared";
import type { Logger, Pipeline, Step, StepContext } from "./types/index.js";
import { LoggerImpl } from "./logger/index.js";
import { formatError } from "./utils/index.js";

/**
 * Runs steps in order and stops at the first failure.
 * Failures are reported in the returned report rather than thrown.
 */
export class PipelineImpl implements Pipeline {
	private readonly logger: Logger;

	constructor(
		private readonly steps: readonly Step[],
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("pipeline");
	}

	async run(context: StepContext): Promise<PipelineReport> {
		const results: StepResult[] = [];

		for (const step of this.steps) {
			if (context.config.skipSteps.includes(step.name)) {
				this.logger.info(`${step.name}: skipped by configuration`);
				results.push({ step: step.name, status: STEP_STATUS.SKIPPED, message: "Skipped by configuration", durationMs: 0 });
				continue;
			}

			this.logger.info(`${step.name}: starting`);
			const startedAt = Date.now();
			let result: StepResult;

			try {
				const outcome = await step.run(context);
				result = { step: step.name, ...outcome, durationMs: Date.now() - startedAt };
			} catch (err) {
				result = {
					step: step.name,
					status: STEP_STATUS.FAILED,
					message: formatError(err),
					durationMs: Date.now() - startedAt,
				};
			}

			results.push(result);

			if (result.status === STEP_STATUS.FAILED) {
				this.logger.error(`${step.name}: ${result.message}`);
				return { ok: false, results, failed: result };
			}
			this.logger.info(`${step.name}: ${result.status.toLowerCase()} (${result.message})`);
		}

		return { ok: true, results, failed: null };
	}
}
