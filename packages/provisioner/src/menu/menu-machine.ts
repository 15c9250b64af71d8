/**
 * Run menu as a finite-state machine, independent of terminal I/O.
 */

import {
	MENU_INPUT,
	MENU_STATE,
	type MenuInput,
	type MenuState,
	RUN_MODE,
} from "@nock-provision/shared";
import type { MenuTransition } from "../types/index.js";
import { MenuTransitionError } from "../errors/index.js";

export interface MenuOption {
	key: string;
	input: MenuInput;
	label: string;
}

export const MENU_OPTIONS: readonly MenuOption[] = [
	{ key: "1", input: MENU_INPUT.RUN_NODE, label: "Run node (no mining)" },
	{ key: "2", input: MENU_INPUT.RUN_MINER, label: "Run miner" },
	{ key: "3", input: MENU_INPUT.EXIT, label: "Exit" },
];

export const MENU_PROMPT = `Select an option [${MENU_OPTIONS.map(option => option.key).join("/")}]: `;

type TransitionHandler = (raw: string) => MenuTransition;

const RETURN_TO_MENU: TransitionHandler = () => ({
	state: MENU_STATE.IDLE,
	effect: { type: "SHOW_MENU" },
});

const TRANSITIONS: Record<MenuState, Partial<Record<MenuInput, TransitionHandler>>> = {
	[MENU_STATE.IDLE]: {
		[MENU_INPUT.RUN_NODE]: () => ({
			state: MENU_STATE.RUNNING_NODE,
			effect: { type: "RUN", mode: RUN_MODE.NODE },
		}),
		[MENU_INPUT.RUN_MINER]: () => ({
			state: MENU_STATE.RUNNING_MINER,
			effect: { type: "RUN", mode: RUN_MODE.MINER },
		}),
		[MENU_INPUT.EXIT]: () => ({
			state: MENU_STATE.EXITED,
			effect: { type: "EXIT", exitCode: 0 },
		}),
		[MENU_INPUT.INVALID]: raw => ({
			state: MENU_STATE.IDLE,
			effect: { type: "INVALID", message: `Invalid option: ${raw}` },
		}),
	},
	[MENU_STATE.RUNNING_NODE]: {
		[MENU_INPUT.PROCESS_EXITED]: RETURN_TO_MENU,
	},
	[MENU_STATE.RUNNING_MINER]: {
		[MENU_INPUT.PROCESS_EXITED]: RETURN_TO_MENU,
	},
	[MENU_STATE.EXITED]: {},
};

/**
 * Map a line typed by the operator to an input symbol.
 * PROCESS_EXITED is internal and never produced here.
 */
export function parseMenuInput(raw: string): MenuInput {
	const key = raw.trim();
	return MENU_OPTIONS.find(option => option.key === key)?.input ?? MENU_INPUT.INVALID;
}

/**
 * @param raw - the operator's line, used in the invalid-option message
 * @throws MenuTransitionError when the state does not accept the input
 */
export function transition(state: MenuState, input: MenuInput, raw: string = ""): MenuTransition {
	const handler = TRANSITIONS[state][input];
	if (!handler) {
		throw new MenuTransitionError(state, input);
	}
	return handler(raw.trim());
}

export function renderMenu(): string {
	const lines = MENU_OPTIONS.map(option => `  ${option.key}) ${option.label}`);
	return ["", "Nockchain", ...lines, ""].join("\n");
}
