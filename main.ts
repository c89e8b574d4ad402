#!/usr/bin/env node

/**
 * resource-graph entry point
 *
 * Usage:
 *   resource-graph show <resource>        # Describe a resource
 *   resource-graph chains <resource>      # Progressive dependency chains
 *   resource-graph tree <resource>        # Collapsed dependency chains
 *   resource-graph order <resource>       # Install order
 *   resource-graph dependents <resource>  # Reverse dependencies
 *   resource-graph validate               # Missing requirements and cycles
 *   resource-graph import <file>          # Copy a JSON catalog into SQLite
 *   resource-graph serve                  # Start HTTP server
 */

import { runCli } from "./http/src/cli.js";

runCli(process.argv.slice(2))
  .then((code) => {
    // serve keeps the process alive through its open server handle
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error("resource-graph failed:", err);
    process.exit(1);
  });
