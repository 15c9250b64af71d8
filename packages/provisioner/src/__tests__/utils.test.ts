import { describe, expect, it } from "vitest";
import { formatCommandLine, formatError } from "../utils/index.js";
import { CommandFailedError, CommandLaunchError, KeyExtractionError, ProvisionError } from "../errors/index.js";

describe("formatCommandLine", () => {
	it("joins plain arguments with spaces", () => {
		expect(formatCommandLine("make", ["install-hoonc"])).toBe("make install-hoonc");
	});

	it("quotes empty arguments and arguments with whitespace", () => {
		expect(formatCommandLine("node", ["-e", "", "a b"])).toBe("node -e '' 'a b'");
	});

	it("escapes single quotes", () => {
		expect(formatCommandLine("sh", ["-c", "echo 'hi'"])).toBe("sh -c 'echo '\\''hi'\\'''");
	});
});

describe("formatError", () => {
	it("uses the message of an Error", () => {
		expect(formatError(new Error("boom"))).toBe("boom");
	});

	it("stringifies anything else", () => {
		expect(formatError(42)).toBe("42");
	});
});

describe("errors", () => {
	it("carry their class name and exit code", () => {
		const error = new CommandLaunchError("nockchain-wallet keygen", "spawn nockchain-wallet ENOENT");

		expect(error).toBeInstanceOf(ProvisionError);
		expect(error.name).toBe("CommandLaunchError");
		expect(error.exitCode).toBe(127);
		expect(error.message).toBe("Could not start nockchain-wallet keygen: spawn nockchain-wallet ENOENT");
	});

	it("describe signal termination", () => {
		expect(new CommandFailedError("make build", null, "SIGKILL").message).toBe("Command terminated by SIGKILL: make build");
	});

	it("explain key extraction failures", () => {
		expect(new KeyExtractionError("EMPTY_KEY").message)
			.toBe("Failed to extract public key: the \"Public Key\" line carries no value");
	});
});
