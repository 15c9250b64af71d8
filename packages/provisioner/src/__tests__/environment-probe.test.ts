import { describe, expect, it } from "vitest";
import { CommandRunnerImpl, EnvironmentProbeImpl, ExecutionEnvironmentImpl } from "../runner/index.js";
import { FakeCommandRunner, createMockLogger } from "./test-utils.js";

describe("EnvironmentProbeImpl", () => {
	it("asks the shell to resolve the command with the environment's variables", async () => {
		const runner = new FakeCommandRunner();
		const environment = new ExecutionEnvironmentImpl({ PATH: "/opt/cargo/bin:/usr/bin" }, createMockLogger());
		const probe = new EnvironmentProbeImpl(runner, environment);

		await expect(probe.hasCommand("cargo")).resolves.toBe(true);
		expect(runner.calls).toEqual([{
			command: "sh",
			args: ["-c", "command -v \"$1\"", "sh", "cargo"],
			env: { PATH: "/opt/cargo/bin:/usr/bin" },
			output: "capture",
		}]);
	});

	it("reports a command as missing on a non-zero exit", async () => {
		const runner = new FakeCommandRunner().on("sh", () => ({ exitCode: 1 }));
		const environment = new ExecutionEnvironmentImpl({}, createMockLogger());
		const probe = new EnvironmentProbeImpl(runner, environment);

		await expect(probe.hasCommand("rustup")).resolves.toBe(false);
	});

	describe("with a real shell", () => {
		const environment = new ExecutionEnvironmentImpl(process.env, createMockLogger());
		const probe = new EnvironmentProbeImpl(new CommandRunnerImpl(createMockLogger()), environment);

		it("finds sh", async () => {
			await expect(probe.hasCommand("sh")).resolves.toBe(true);
		});

		it("does not find a nonexistent command", async () => {
			await expect(probe.hasCommand("provision-test-no-such-command")).resolves.toBe(false);
		});
	});
});
