#!/usr/bin/env tsx
/**
 * dispatchgen executable
 */

import { runCli } from "./cli.js";

// Skip node and script name
const args = process.argv.slice(2);

runCli(args)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
