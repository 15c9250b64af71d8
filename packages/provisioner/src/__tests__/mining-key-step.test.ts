import { afterEach, beforeEach, describe, expect, it } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { MiningKeyStep } from "../steps/index.js";
import { EnvFileStoreImpl } from "../env-file/index.js";
import { WalletClientImpl } from "../keygen/index.js";
import { ExecutionEnvironmentImpl } from "../runner/index.js";
import { CommandFailedError, KeyExtractionError } from "../errors/index.js";
import type { Logger, ProvisionerConfig } from "../types/index.js";
import {
	FakeCommandRunner,
	cleanupTempDir,
	createMockLogger,
	createStepContext,
	createTempDir,
	createTestConfig,
	readEnvFile,
	writeCheckout,
} from "./test-utils.js";

const KEYGEN_OUTPUT = [
	"Keygen",
	"Generating keys",
	"Seed phrase: test seed words only",
	"Public Key: 3kPxTestKey",
	"",
].join("\n");

describe("MiningKeyStep", () => {
	let tempDir: string;
	let config: ProvisionerConfig;
	let envPath: string;
	let runner: FakeCommandRunner;
	let logger: Logger;
	let step: MiningKeyStep;

	beforeEach(() => {
		tempDir = createTempDir();
		config = createTestConfig(tempDir);
		writeCheckout(config.installDir);
		envPath = path.join(config.installDir, ".env");
		runner = new FakeCommandRunner().on("nockchain-wallet", () => ({ stdout: KEYGEN_OUTPUT }));
		logger = createMockLogger();

		const environment = new ExecutionEnvironmentImpl({ PATH: "/opt/cargo/bin:/usr/bin" }, createMockLogger());
		const wallet = new WalletClientImpl(runner, environment, config.installDir);
		step = new MiningKeyStep(new EnvFileStoreImpl(envPath, createMockLogger()), wallet, logger);
	});

	afterEach(() => {
		cleanupTempDir(tempDir);
	});

	it("generates a key when MINING_PUBKEY is empty", async () => {
		fs.writeFileSync(envPath, "MINING_PUBKEY=\nRUST_LOG=info\n");

		const outcome = await step.run(createStepContext(config));

		expect(readEnvFile(config.installDir)).toBe("MINING_PUBKEY=3kPxTestKey\nRUST_LOG=info\n");
		expect(outcome).toEqual({ status: "SUCCEEDED", message: "MINING_PUBKEY set to 3kPxTestKey" });
	});

	it("invokes the wallet with visible output in the install directory", async () => {
		fs.writeFileSync(envPath, "MINING_PUBKEY=\n");

		await step.run(createStepContext(config));

		expect(runner.calls).toEqual([{
			command: "nockchain-wallet",
			args: ["keygen"],
			cwd: config.installDir,
			env: { PATH: "/opt/cargo/bin:/usr/bin" },
			output: "tee",
		}]);
	});

	it("appends the key when MINING_PUBKEY is absent", async () => {
		fs.writeFileSync(envPath, "RUST_LOG=info\n");

		await step.run(createStepContext(config));

		expect(readEnvFile(config.installDir)).toBe("RUST_LOG=info\nMINING_PUBKEY=3kPxTestKey\n");
	});

	it("reminds the operator to record the seed phrase", async () => {
		fs.writeFileSync(envPath, "MINING_PUBKEY=\n");

		await step.run(createStepContext(config));

		expect(logger.info).toHaveBeenCalledWith("Public key: 3kPxTestKey");
		expect(logger.warn).toHaveBeenCalledTimes(1);
	});

	it("skips when a key is already configured", async () => {
		fs.writeFileSync(envPath, "MINING_PUBKEY=existingTestKey\n");

		const outcome = await step.run(createStepContext(config));

		expect(runner.calls).toEqual([]);
		expect(readEnvFile(config.installDir)).toBe("MINING_PUBKEY=existingTestKey\n");
		expect(outcome).toEqual({ status: "SKIPPED", message: "MINING_PUBKEY already set" });
	});

	it("fails without touching .env when no key can be extracted", async () => {
		fs.writeFileSync(envPath, "MINING_PUBKEY=\n");
		runner.on("nockchain-wallet", () => ({ stdout: "wallet: something went wrong\n" }));

		await expect(step.run(createStepContext(config))).rejects.toThrow(KeyExtractionError);
		expect(readEnvFile(config.installDir)).toBe("MINING_PUBKEY=\n");
	});

	it("propagates wallet failures", async () => {
		fs.writeFileSync(envPath, "MINING_PUBKEY=\n");
		runner.on("nockchain-wallet", () => ({ exitCode: 1 }));

		await expect(step.run(createStepContext(config)))
			.rejects.toThrow(new CommandFailedError("nockchain-wallet keygen", 1));
	});
});
