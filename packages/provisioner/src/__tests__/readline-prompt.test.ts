import { describe, expect, it } from "vitest";
import { PassThrough } from "node:stream";
import { ReadlinePrompt, RunMenuImpl } from "../menu/index.js";
import { createMockLogger, createMockNodeRunner } from "./test-utils.js";

function createStreams() {
	const input = new PassThrough();
	const output = new PassThrough();
	let written = "";
	output.setEncoding("utf-8");
	output.on("data", (chunk: string) => {
		written += chunk;
	});
	return { input, output, written: () => written };
}

function nextTurn(): Promise<void> {
	return new Promise(resolve => setImmediate(resolve));
}

describe("ReadlinePrompt", () => {
	it("writes text to the output", async () => {
		const streams = createStreams();
		new ReadlinePrompt(streams.input, streams.output).write("hello\n");
		await nextTurn();

		expect(streams.written()).toBe("hello\n");
	});

	it("asks a question and resolves the answer", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);

		const answer = prompt.ask("Choice: ");
		streams.input.write("2\n");

		await expect(answer).resolves.toBe("2");
		expect(streams.written()).toBe("Choice: ");
		prompt.close();
	});

	it("answers consecutive questions typed one at a time", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);

		const first = prompt.ask("? ");
		streams.input.write("1\n");
		await expect(first).resolves.toBe("1");

		const second = prompt.ask("? ");
		streams.input.write("3\n");
		await expect(second).resolves.toBe("3");
		prompt.close();
	});

	it("answers every line of a single chunk in order", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);
		streams.input.write("9\n1\n3\n");

		await expect(prompt.ask("? ")).resolves.toBe("9");
		await expect(prompt.ask("? ")).resolves.toBe("1");
		await expect(prompt.ask("? ")).resolves.toBe("3");
		prompt.close();
	});

	it("answers queued lines before reporting the end of input", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);
		streams.input.end("1\n");

		await expect(prompt.ask("? ")).resolves.toBe("1");
		await expect(prompt.ask("? ")).resolves.toBeNull();
	});

	it("resolves null once input ends, and on every later question", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);

		const answer = prompt.ask("? ");
		streams.input.end();

		await expect(answer).resolves.toBeNull();
		await expect(prompt.ask("? ")).resolves.toBeNull();
	});

	it("resolves a pending question with null on close", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);

		const answer = prompt.ask("? ");
		prompt.close();

		await expect(answer).resolves.toBeNull();
	});

	it("keeps lines written while paused for the next question", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);

		const first = prompt.ask("? ");
		streams.input.write("1\n");
		await expect(first).resolves.toBe("1");

		prompt.pause();
		streams.input.write("3\n");
		await nextTurn();
		prompt.resume();

		await expect(prompt.ask("? ")).resolves.toBe("3");
		prompt.close();
	});

	it("drives the run menu from piped input", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);
		const nodeRunner = createMockNodeRunner();
		streams.input.end("9\n1\n3\n");

		await expect(new RunMenuImpl(prompt, nodeRunner, createMockLogger()).run()).resolves.toBe(0);

		expect(nodeRunner.run).toHaveBeenCalledTimes(1);
		expect(nodeRunner.run).toHaveBeenCalledWith("node");
		expect(streams.written()).toContain("Invalid option: 9\n");
	});

	it("exits the run menu when piped input ends without a choice to exit", async () => {
		const streams = createStreams();
		const prompt = new ReadlinePrompt(streams.input, streams.output);
		const nodeRunner = createMockNodeRunner();
		streams.input.end("2\n");

		await expect(new RunMenuImpl(prompt, nodeRunner, createMockLogger()).run()).resolves.toBe(0);

		expect(nodeRunner.run).toHaveBeenCalledWith("miner");
	});
});
