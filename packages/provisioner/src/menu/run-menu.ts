import { MENU_INPUT, MENU_STATE, type MenuState, type RunMode } from "@nock-provision/shared";
import type { Logger, NodeRunner, Prompt, RunMenu } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { MENU_PROMPT, parseMenuInput, renderMenu, transition } from "./menu-machine.js";

/**
 * Drives the menu state machine from operator input.
 * End of input is treated as choosing Exit.
 */
export class RunMenuImpl implements RunMenu {
	private state: MenuState = MENU_STATE.IDLE;
	private readonly logger: Logger;

	constructor(
		private readonly prompt: Prompt,
		private readonly nodeRunner: NodeRunner,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("menu");
	}

	getState(): MenuState {
		return this.state;
	}

	async run(): Promise<number> {
		this.state = MENU_STATE.IDLE;
		this.prompt.write(`${renderMenu()}\n`);

		try {
			while (this.state !== MENU_STATE.EXITED) {
				const raw = await this.prompt.ask(MENU_PROMPT);
				const input = raw === null ? MENU_INPUT.EXIT : parseMenuInput(raw);
				const next = transition(this.state, input, raw ?? "");
				this.state = next.state;

				const { effect } = next;
				if (effect.type === "EXIT") {
					this.logger.debug("Exit selected");
					return effect.exitCode;
				}
				if (effect.type === "INVALID") {
					this.prompt.write(`${effect.message}\n`);
				} else if (effect.type === "RUN") {
					await this.runNode(effect.mode);
					this.state = transition(this.state, MENU_INPUT.PROCESS_EXITED).state;
				}
				this.prompt.write(`${renderMenu()}\n`);
			}
			return 0;
		} finally {
			this.prompt.close();
		}
	}

	private async runNode(mode: RunMode): Promise<void> {
		this.prompt.pause();
		try {
			await this.nodeRunner.run(mode);
		} finally {
			this.prompt.resume();
		}
	}
}
