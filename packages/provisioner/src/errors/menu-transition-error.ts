import type { MenuInput, MenuState } from "@nock-provision/shared";
import { ProvisionError } from "./provision-error.js";

/**
 * Thrown when the run menu receives an input its current state does not accept
 */
export class MenuTransitionError extends ProvisionError {
	constructor(state: MenuState, input: MenuInput) {
		super(`No menu transition from ${state} on ${input}`);
	}
}
