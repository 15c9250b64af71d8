import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { isMainModule } from "../cli.js";
import { cleanupTempDir, createTempDir } from "./test-utils.js";

const CLI_PATH = fileURLToPath(new URL("../cli.ts", import.meta.url));

describe("isMainModule", () => {
	let tempDir: string;

	beforeEach(() => {
		tempDir = createTempDir();
	});

	afterEach(() => {
		cleanupTempDir(tempDir);
	});

	it("is false without a script path", () => {
		expect(isMainModule(undefined)).toBe(false);
	});

	it("is true for this module's own path", () => {
		expect(isMainModule(CLI_PATH)).toBe(true);
	});

	it("is true through a symlink to this module", () => {
		const link = path.join(tempDir, "nock-provision");
		fs.symlinkSync(CLI_PATH, link);

		expect(isMainModule(link)).toBe(true);
	});

	it("is false for another script that is also named cli.ts", () => {
		const other = path.join(tempDir, "cli.ts");
		fs.writeFileSync(other, "export {};\n");

		expect(isMainModule(other)).toBe(false);
	});

	it("is false for a path that does not exist", () => {
		expect(isMainModule(path.join(tempDir, "missing", "cli.js"))).toBe(false);
	});
});
