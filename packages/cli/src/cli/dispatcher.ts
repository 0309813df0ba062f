/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { createConsoleReporter } from "../reporter.js";
import type { DispatchgenConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  workingDir: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`dispatchgen v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "generate") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'dispatchgen --help' for usage information");
    return 2;
  }

  // An explicit --config must exist; a discovered one is optional.
  const configPath = parsed.options.config
    ? resolve(workingDir, parsed.options.config)
    : findConfig(workingDir);

  let config: DispatchgenConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 3;
    }
    config = configResult.value;
  }

  const resolved = resolveConfig(
    config,
    parsed.options,
    parsed.registries,
    workingDir,
    configPath ? dirname(configPath) : workingDir
  );
  const reporter = createConsoleReporter(resolved);
  if (configPath) {
    reporter.detail(`Using ${configPath}`);
  }

  const result = generateCommand(resolved, reporter);
  if (!result.ok) {
    reporter.error(`Error: ${result.error}`);
    return 5;
  }
  return 0;
};
