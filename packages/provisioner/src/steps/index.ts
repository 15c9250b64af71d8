export { BuildStep } from "./build-step.js";
export { MiningKeyStep } from "./mining-key-step.js";
export { privileged } from "./privileged.js";
export { ReachabilityStep } from "./reachability-step.js";
export { SourceSyncStep } from "./source-sync-step.js";
export { SystemPackagesStep } from "./system-packages-step.js";
export { ToolchainStep, rustupInstallScript } from "./toolchain-step.js";
