/**
 * dispatchgen CLI - argument parsing, configuration and artifact writing
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export {
  generateCommand,
  type GenerateSummary,
} from "./commands/generate.js";
export { createConsoleReporter, type Reporter } from "./reporter.js";
export * from "./config.js";
export * from "./types.js";
