/**
 * Render a command and its arguments the way an operator would type them.
 * Arguments containing whitespace or quotes are single-quoted.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
	return [command, ...args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
	if (arg !== "" && !/[\s'"]/.test(arg)) {
		return arg;
	}
	return `'${arg.replace(/'/g, "'\\''")}'`;
}
