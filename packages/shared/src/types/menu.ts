/**
 * What the node is started as.
 */
export const RUN_MODE = {
	NODE: "node",
	MINER: "miner",
} as const;

export type RunMode = (typeof RUN_MODE)[keyof typeof RUN_MODE];

/**
 * States of the run menu.
 * - IDLE: menu displayed, waiting for input
 * - RUNNING_NODE / RUNNING_MINER: blocked on the node process
 * - EXITED: terminal
 */
export const MENU_STATE = {
	IDLE: "IDLE",
	RUNNING_NODE: "RUNNING_NODE",
	RUNNING_MINER: "RUNNING_MINER",
	EXITED: "EXITED",
} as const;

export type MenuState = (typeof MENU_STATE)[keyof typeof MENU_STATE];

/**
 * Input alphabet of the run menu. PROCESS_EXITED is raised internally
 * when the node process ends; the others come from the operator.
 */
export const MENU_INPUT = {
	RUN_NODE: "RUN_NODE",
	RUN_MINER: "RUN_MINER",
	EXIT: "EXIT",
	INVALID: "INVALID",
	PROCESS_EXITED: "PROCESS_EXITED",
} as const;

export type MenuInput = (typeof MENU_INPUT)[keyof typeof MENU_INPUT];

export function isRunMode(value: string): value is RunMode {
	return value === RUN_MODE.NODE || value === RUN_MODE.MINER;
}
