export * from "./constants.js";
export * from "./types/env-file.js";
export * from "./types/menu.js";
export * from "./types/step.js";
