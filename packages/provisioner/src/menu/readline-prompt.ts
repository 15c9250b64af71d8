import * as readline from "node:readline";
import type { Prompt } from "../types/index.js";

type LineWaiter = (line: string | null) => void;

/**
 * Terminal prompt over stdin/stdout.
 *
 * One readline interface serves the whole menu. Lines that arrive before
 * they are asked for are queued, so piped input is answered in order.
 * The interface is paused while the node owns the terminal.
 */
export class ReadlinePrompt implements Prompt {
	private rl: readline.Interface | null = null;
	private readonly lines: string[] = [];
	private readonly waiters: LineWaiter[] = [];
	private ended = false;

	constructor(
		private readonly input: NodeJS.ReadableStream = process.stdin,
		private readonly output: NodeJS.WritableStream = process.stdout,
	) {}

	write(text: string): void {
		this.output.write(text);
	}

	ask(question: string): Promise<string | null> {
		const rl = this.open();
		this.output.write(question);

		const queued = this.lines.shift();
		if (queued !== undefined) {
			return Promise.resolve(queued);
		}
		if (this.ended) {
			return Promise.resolve(null);
		}

		rl.resume();
		return new Promise<string | null>((resolve) => {
			this.waiters.push(resolve);
		});
	}

	pause(): void {
		if (!this.ended) {
			this.rl?.pause();
		}
	}

	resume(): void {
		if (!this.ended) {
			this.rl?.resume();
		}
	}

	close(): void {
		this.rl?.close();
	}

	private open(): readline.Interface {
		if (this.rl !== null) {
			return this.rl;
		}

		const rl = readline.createInterface({ input: this.input, terminal: false });

		rl.on("line", (line) => {
			const waiter = this.waiters.shift();
			if (waiter) {
				waiter(line);
			} else {
				this.lines.push(line);
			}
		});

		// End of input answers every pending and future question with null
		rl.on("close", () => {
			this.ended = true;
			for (const waiter of this.waiters.splice(0)) {
				waiter(null);
			}
		});

		this.rl = rl;
		return rl;
	}
}
