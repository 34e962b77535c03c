#!/usr/bin/env node
/**
 * scout CLI entry point
 */

import { runScoutCli } from "./cli/main.js";

runScoutCli().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
