#!/usr/bin/env node
/**
 * Icinga API CLI
 */

import { runCli } from "./program.js";

/**
 * Main entry point
 */
async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

// Run CLI
void main();
