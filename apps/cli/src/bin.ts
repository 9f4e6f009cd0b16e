#!/usr/bin/env node

/**
 * Entry point for the dgraph-admin binary.
 */

import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((exitCode) => process.exit(exitCode))
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
