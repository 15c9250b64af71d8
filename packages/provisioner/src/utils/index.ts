export { formatError } from "./format-error.js";
export { formatCommandLine } from "./format-command.js";
