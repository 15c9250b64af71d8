// =============================================================================
// Step Names and Statuses
// =============================================================================

/**
 * Provisioning steps, listed in execution order.
 */
export const STEP_NAME = {
	SYSTEM_PACKAGES: "SYSTEM_PACKAGES",
	TOOLCHAIN: "TOOLCHAIN",
	SOURCE_SYNC: "SOURCE_SYNC",
	BUILD: "BUILD",
	MINING_KEY: "MINING_KEY",
	REACHABILITY: "REACHABILITY",
} as const;

export type StepName = (typeof STEP_NAME)[keyof typeof STEP_NAME];

/**
 * Outcome of a single step.
 * - SUCCEEDED: the step did its work
 * - SKIPPED: nothing to do, or skipped by configuration
 * - WARNED: advisory failure, the pipeline continues
 * - FAILED: the pipeline stops here
 */
export const STEP_STATUS = {
	SUCCEEDED: "SUCCEEDED",
	SKIPPED: "SKIPPED",
	WARNED: "WARNED",
	FAILED: "FAILED",
} as const;

export type StepStatus = (typeof STEP_STATUS)[keyof typeof STEP_STATUS];

// =============================================================================
// Results
// =============================================================================

export interface StepResult {
	step: StepName;
	status: StepStatus;
	/** Human-readable summary shown to the operator */
	message: string;
	durationMs: number;
}

/**
 * Result of one pipeline run. Steps after a failure are absent from `results`.
 */
export interface PipelineReport {
	ok: boolean;
	results: StepResult[];
	/** The failing step, null when every step passed */
	failed: StepResult | null;
}

// =============================================================================
// Type Guards
// =============================================================================

const STEP_NAMES: readonly string[] = Object.values(STEP_NAME);

export function isStepName(value: string): value is StepName {
	return STEP_NAMES.includes(value);
}
