import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BuildStep } from "../steps/index.js";
import { CommandFailedError } from "../errors/index.js";
import type { ProvisionerConfig } from "../types/index.js";
import {
	FakeCommandRunner,
	cleanupTempDir,
	createMockLogger,
	createStepContext,
	createTempDir,
	createTestConfig,
} from "./test-utils.js";

describe("BuildStep", () => {
	let tempDir: string;
	let config: ProvisionerConfig;
	let runner: FakeCommandRunner;
	let step: BuildStep;

	beforeEach(() => {
		tempDir = createTempDir();
		config = createTestConfig(tempDir);
		runner = new FakeCommandRunner();
		step = new BuildStep(runner, createMockLogger());
	});

	afterEach(() => {
		cleanupTempDir(tempDir);
	});

	it("runs every make target in order inside the install directory", async () => {
		const outcome = await step.run(createStepContext(config));

		expect(runner.commandLines()).toEqual([
			"make install-hoonc",
			"make build",
			"make install-nockchain-wallet",
			"make install-nockchain",
		]);
		expect(runner.calls.every(call => call.cwd === config.installDir)).toBe(true);
		expect(outcome).toEqual({
			status: "SUCCEEDED",
			message: "Built install-hoonc, build, install-nockchain-wallet, install-nockchain",
		});
	});

	it("builds with the execution environment", async () => {
		const context = createStepContext(config);
		context.environment.prependPath("/opt/cargo/bin", "test");

		await step.run(context);

		expect(runner.calls[0]?.env?.PATH).toBe("/opt/cargo/bin:/usr/bin:/bin");
	});

	it("stops at the first failing target", async () => {
		runner.on("make", () => ({ exitCode: 2 }), "build");

		await expect(step.run(createStepContext(config)))
			.rejects.toThrow(new CommandFailedError("make build", 2));
		expect(runner.commandLines()).toEqual(["make install-hoonc", "make build"]);
	});
});
