/**
 * dispatchgen argument parsing and command dispatch
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { parseArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
