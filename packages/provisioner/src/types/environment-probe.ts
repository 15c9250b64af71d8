/**
 * Detects whether commands are resolvable in the execution environment.
 */
export interface EnvironmentProbe {
	hasCommand(command: string): Promise<boolean>;
}
