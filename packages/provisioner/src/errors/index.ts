export { ProvisionError } from "./provision-error.js";
export { CommandFailedError } from "./command-failed-error.js";
export { CommandLaunchError } from "./command-launch-error.js";
export { ToolchainMissingError } from "./toolchain-missing-error.js";
export { KeyExtractionError } from "./key-extraction-error.js";
export { EnvFileMissingError } from "./env-file-missing-error.js";
export { MenuTransitionError } from "./menu-transition-error.js";
