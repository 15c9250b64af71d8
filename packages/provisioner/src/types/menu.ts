import type { MenuState, RunMode } from "@nock-provision/shared";

/**
 * Side effect the menu driver performs after a transition.
 */
export type MenuEffect =
	| { type: "RUN"; mode: RunMode }
	| { type: "EXIT"; exitCode: number }
	| { type: "INVALID"; message: string }
	| { type: "SHOW_MENU" };

export interface MenuTransition {
	state: MenuState;
	effect: MenuEffect;
}

/**
 * Line-oriented operator input.
 */
export interface Prompt {
	/** Print text without waiting for input. */
	write(text: string): void;
	/** Ask a question; resolves null when input has ended. */
	ask(question: string): Promise<string | null>;
	/** Stop reading input while another process owns the terminal. */
	pause(): void;
	resume(): void;
	/** Release the input stream. Later questions resolve null. */
	close(): void;
}

export interface NodeInvocation {
	command: string;
	args: string[];
	cwd: string;
	env: Record<string, string>;
}

export interface NodeRunOutcome {
	exitCode: number | null;
	signal: NodeJS.Signals | null;
}

/**
 * Starts the node binary and blocks until it exits.
 */
export interface NodeRunner {
	run(mode: RunMode): Promise<NodeRunOutcome>;
}

export interface RunMenu {
	/** Loop until the operator exits; resolves the process exit code. */
	run(): Promise<number>;
}
