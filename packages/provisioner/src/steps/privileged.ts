/**
 * Prefix a command with sudo when the provisioner is not running as root.
 *
 * sudo resets the environment, so `assignments` travel on its command line
 * as KEY=VALUE arguments. Without sudo the caller's spawn environment
 * carries them.
 */
export function privileged(
	command: string,
	args: string[],
	useSudo: boolean,
	assignments: Record<string, string> = {},
): { command: string; args: string[] } {
	if (!useSudo) {
		return { command, args };
	}
	const prefix = Object.entries(assignments).map(([key, value]) => `${key}=${value}`);
	return { command: "sudo", args: [...prefix, command, ...args] };
}
