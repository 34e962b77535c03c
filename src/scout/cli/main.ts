/**
 * Main CLI entry point for scout
 */

import { Command } from "commander";
import { registerInitCommand } from "./commands/init.js";
import { registerRunCommand } from "./commands/run.js";
import { registerRunsCommand } from "./commands/runs.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerGeographyCommand } from "./commands/geography.js";

/**
 * Build the scout CLI program
 */
export function buildScoutProgram(): Command {
  const program = new Command();

  program
    .name("scout")
    .description("Discover and verify regional channels, wave by wave")
    .version("0.1.0");

  registerInitCommand(program);
  registerRunCommand(program);
  registerRunsCommand(program);
  registerConfigCommand(program);
  registerGeographyCommand(program);

  return program;
}

/**
 * Run the CLI
 */
export async function runScoutCli(args: string[] = process.argv): Promise<void> {
  const program = buildScoutProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
