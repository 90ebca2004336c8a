#!/usr/bin/env node

/**
 * Main entry point for Webi Object Finder
 * Supports two modes:
 * 1. CLI mode (default) - Scan one folder or report and print the matches
 * 2. STDIO mode - Serve the scan as MCP tools over stdio
 */

import { main } from "./cli.js";
import { logger } from "./utils/logger.js";

main(process.argv.slice(2), process.env).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    logger.exception("Webi Object Finder stopped", error, {
      component: "index",
      operation: "main",
    });
    process.exitCode = 1;
  }
);
