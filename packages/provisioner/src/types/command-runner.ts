/**
 * How a subprocess's standard output is handled.
 * - inherit: written straight to the terminal, not captured
 * - capture: captured silently
 * - tee: written to the terminal and captured
 */
export type OutputMode = "inherit" | "capture" | "tee";

export interface CommandSpec {
	command: string;
	args: string[];
	cwd?: string;
	/** Full environment of the subprocess; defaults to the provisioner's own */
	env?: Record<string, string>;
	output?: OutputMode;
}

export interface CommandOutcome {
	/** Exit status, null when the process was killed by a signal */
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	/** Captured standard output; empty in inherit mode */
	stdout: string;
}

/**
 * Blocking subprocess execution.
 */
export interface CommandRunner {
	/** Run to completion and report how the process ended. */
	run(spec: CommandSpec): Promise<CommandOutcome>;
	/**
	 * Run to completion, rejecting with CommandFailedError on a non-zero exit
	 * or CommandLaunchError when the process cannot start.
	 */
	exec(spec: CommandSpec): Promise<CommandOutcome>;
}
