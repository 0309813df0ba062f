/**
 * CLI argument parser
 */

import type { CliOptions, ParsedArgs } from "../types.js";

const isRegistryFile = (arg: string): boolean => arg.endsWith(".xml");

/**
 * Parse CLI arguments.
 *
 * `dispatchgen gl.xml egl.xml` is shorthand for `dispatchgen generate
 * gl.xml egl.xml`.
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const registries: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!arg.startsWith("-")) {
      if (!command) {
        if (isRegistryFile(arg)) {
          command = "generate";
          registries.push(arg);
        } else {
          command = arg;
        }
      } else {
        registries.push(arg);
      }
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", registries: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", registries: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--outputdir":
        options.outputDir = args[++i] ?? "";
        break;
      case "--includedir":
        options.includeDir = args[++i] ?? "";
        break;
      case "--srcdir":
        options.srcDir = args[++i] ?? "";
        break;
      case "--header":
        options.header = true;
        break;
      case "--no-header":
        options.header = false;
        break;
      case "--source":
        options.source = true;
        break;
      case "--no-source":
        options.source = false;
        break;
      case "--vapi":
        options.vapi = true;
        break;
      case "--no-vapi":
        options.vapi = false;
        break;
    }
  }

  return { command, registries, options };
};
