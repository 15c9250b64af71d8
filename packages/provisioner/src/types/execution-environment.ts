/**
 * One recorded change to the environment subprocesses run with.
 */
export interface EnvChange {
	key: string;
	previous: string | undefined;
	next: string;
	reason: string;
}

/**
 * Environment variables handed to every subprocess.
 * Mutations are recorded so they can be inspected after the fact.
 */
export interface ExecutionEnvironment {
	variables(): Record<string, string>;
	get(key: string): string | undefined;
	set(key: string, value: string, reason: string): void;
	/** Prepend a directory to PATH unless it is already listed. */
	prependPath(dir: string, reason: string): void;
	history(): readonly EnvChange[];
}
