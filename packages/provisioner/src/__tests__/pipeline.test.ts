import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { STEP_STATUS, type StepName } from "@nock-provision/shared";
import { PipelineImpl } from "../pipeline.js";
import type { Step, StepContext, StepOutcome } from "../types/index.js";
import { cleanupTempDir, createMockLogger, createStepContext, createTempDir, createTestConfig } from "./test-utils.js";

function createStep(name: StepName, outcome: StepOutcome | Error) {
	const run = outcome instanceof Error
		? vi.fn<Step["run"]>().mockRejectedValue(outcome)
		: vi.fn<Step["run"]>().mockResolvedValue(outcome);
	return { name, run };
}

describe("PipelineImpl", () => {
	let tempDir: string;
	let context: StepContext;

	beforeEach(() => {
		tempDir = createTempDir();
		context = createStepContext(createTestConfig(tempDir));
	});

	afterEach(() => {
		cleanupTempDir(tempDir);
	});

	it("runs every step in order and reports success", async () => {
		const order: string[] = [];
		const first = createStep("SYSTEM_PACKAGES", { status: "SUCCEEDED", message: "installed" });
		const second = createStep("REACHABILITY", { status: "WARNED", message: "not confirmed" });
		first.run.mockImplementation(async () => {
			order.push("first");
			return { status: "SUCCEEDED", message: "installed" };
		});
		second.run.mockImplementation(async () => {
			order.push("second");
			return { status: "WARNED", message: "not confirmed" };
		});

		const report = await new PipelineImpl([first, second], createMockLogger()).run(context);

		expect(order).toEqual(["first", "second"]);
		expect(report.ok).toBe(true);
		expect(report.failed).toBeNull();
		expect(report.results.map(r => [r.step, r.status, r.message])).toEqual([
			["SYSTEM_PACKAGES", "SUCCEEDED", "installed"],
			["REACHABILITY", "WARNED", "not confirmed"],
		]);
	});

	it("passes the shared context to each step", async () => {
		const step = createStep("BUILD", { status: "SUCCEEDED", message: "built" });

		await new PipelineImpl([step], createMockLogger()).run(context);

		expect(step.run).toHaveBeenCalledWith(context);
	});

	it("stops at the first failing step", async () => {
		const first = createStep("TOOLCHAIN", { status: "SUCCEEDED", message: "ok" });
		const failing = createStep("SOURCE_SYNC", new Error("Command failed with exit code 128: git pull"));
		const never = createStep("BUILD", { status: "SUCCEEDED", message: "built" });

		const report = await new PipelineImpl([first, failing, never], createMockLogger()).run(context);

		expect(never.run).not.toHaveBeenCalled();
		expect(report.ok).toBe(false);
		expect(report.results).toHaveLength(2);
		expect(report.failed).toMatchObject({
			step: "SOURCE_SYNC",
			status: STEP_STATUS.FAILED,
			message: "Command failed with exit code 128: git pull",
		});
	});

	it("records non-Error throws as their string form", async () => {
		const failing = createStep("BUILD", { status: "SUCCEEDED", message: "" });
		failing.run.mockRejectedValue("make exploded");

		const report = await new PipelineImpl([failing], createMockLogger()).run(context);

		expect(report.failed?.message).toBe("make exploded");
	});

	it("skips steps named in the configuration without running them", async () => {
		const skipped = createStep("SYSTEM_PACKAGES", { status: "SUCCEEDED", message: "installed" });
		const ran = createStep("TOOLCHAIN", { status: "SUCCEEDED", message: "updated" });
		const skipContext = createStepContext(createTestConfig(tempDir, { skipSteps: ["SYSTEM_PACKAGES"] }));

		const report = await new PipelineImpl([skipped, ran], createMockLogger()).run(skipContext);

		expect(skipped.run).not.toHaveBeenCalled();
		expect(ran.run).toHaveBeenCalledTimes(1);
		expect(report.results[0]).toEqual({
			step: "SYSTEM_PACKAGES",
			status: "SKIPPED",
			message: "Skipped by configuration",
			durationMs: 0,
		});
	});

	it("measures step duration", async () => {
		vi.useFakeTimers({ toFake: ["Date"] });
		try {
			const slow = createStep("BUILD", { status: "SUCCEEDED", message: "" });
			slow.run.mockImplementation(async () => {
				vi.setSystemTime(Date.now() + 1500);
				return { status: "SUCCEEDED", message: "built" };
			});

			const report = await new PipelineImpl([slow], createMockLogger()).run(context);

			expect(report.results[0]?.durationMs).toBe(1500);
		} finally {
			vi.useRealTimers();
		}
	});

	it("reports success for an empty pipeline", async () => {
		const report = await new PipelineImpl([], createMockLogger()).run(context);

		expect(report).toEqual({ ok: true, results: [], failed: null });
	});
});
