/**
 * scout init command
 */

import { Command } from "commander";
import { initConfig, configExists, getConfigPath } from "../../config/loader.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init")
    .description("Initialize scout configuration")
    .option("-g, --geography <file>", "Default geography file")
    .option("-f, --force", "Overwrite existing config")
    .action(async (opts: { geography?: string; force?: boolean }) => {
      const configPath = getConfigPath();

      // Check if config already exists
      if (!opts.force && (await configExists())) {
        console.log(`Config already exists at ${configPath}`);
        console.log("Use --force to overwrite");
        return;
      }

      try {
        const { configPath: savedPath, config } = await initConfig(opts.geography, {
          force: opts.force,
        });

        console.log(`✓ Created config at ${savedPath}`);
        if (config.geographyPath) {
          console.log(`✓ Geography: ${config.geographyPath}`);
        }

        console.log("\nNext steps:");
        console.log("  1. Check the geography: scout geography validate <file>");
        console.log("  2. Point at a model:    scout config set oracle.endpoint http://127.0.0.1:8081");
        console.log("  3. Start a run:         scout run --geography <file>");
      } catch (error) {
        console.error(
          `Failed to initialize: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });
}
