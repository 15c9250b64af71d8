import type { StepName, StepResult } from "@nock-provision/shared";
import type { ExecutionEnvironment } from "./execution-environment.js";
import type { ProvisionerConfig } from "./provisioner-config.js";

/**
 * State shared by the steps of one pipeline run.
 * Configuration is read-only; environment changes are audited.
 */
export interface StepContext {
	readonly config: Readonly<ProvisionerConfig>;
	readonly environment: ExecutionEnvironment;
}

/**
 * Outcome a step reports; the pipeline adds the step name and timing.
 */
export type StepOutcome = Pick<StepResult, "status" | "message">;

/**
 * An idempotent provisioning step.
 * Throwing marks the step FAILED and stops the pipeline.
 */
export interface Step {
	readonly name: StepName;
	run(context: StepContext): Promise<StepOutcome>;
}
