export { CommandRunnerImpl, type OutputEcho } from "./command-runner.js";
export { EnvironmentProbeImpl } from "./environment-probe.js";
export { ExecutionEnvironmentImpl } from "./execution-environment.js";
