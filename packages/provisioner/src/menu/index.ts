export { MENU_OPTIONS, MENU_PROMPT, type MenuOption, parseMenuInput, renderMenu, transition } from "./menu-machine.js";
export { buildBindAddress, buildNodeInvocation, formatNodeInvocation } from "./node-command.js";
export { NodeRunnerImpl } from "./node-runner.js";
export { ReadlinePrompt } from "./readline-prompt.js";
export { RunMenuImpl } from "./run-menu.js";
