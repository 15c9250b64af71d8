import type { PipelineReport } from "@nock-provision/shared";
import type { StepContext } from "./step.js";

/**
 * Runs provisioning steps in order, stopping at the first failure.
 */
export interface Pipeline {
	run(context: StepContext): Promise<PipelineReport>;
}
