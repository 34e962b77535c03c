/**
 * scout geography command - Inspect geography files
 */

import { Command } from "commander";
import { loadGeography, orderRegions } from "../../config/geography.js";
import { loadConfig } from "../../config/loader.js";

export function registerGeographyCommand(program: Command): void {
  const geographyCmd = program.command("geography").description("Inspect geography files");

  geographyCmd
    .command("validate")
    .description("Check a geography file and show the order regions will run in")
    .argument("<file>", "Geography file (YAML or JSON)")
    .option("--json", "Output as JSON")
    .action(async (file: string, opts: { json?: boolean }) => {
      try {
        const config = await loadConfig();
        const geography = await loadGeography(file);
        const regions = orderRegions(geography, config.resolution.regionOrder);
        const localities = regions.reduce((sum, r) => sum + r.localities.length, 0);

        if (opts.json) {
          console.log(
            JSON.stringify(
              {
                categories: geography.categories.map((c) => c.id),
                regions: regions.map((r) => ({ id: r.id, localities: r.localities.map((l) => l.id) })),
                slots: localities * geography.categories.length,
              },
              null,
              2,
            ),
          );
          return;
        }

        console.log(`✓ ${file} is valid`);
        console.log(`  Categories: ${geography.categories.map((c) => c.id).join(", ")}`);
        console.log(`  Regions:    ${regions.map((r) => r.id).join(" -> ")}`);
        console.log(`  Slots:      ${localities * geography.categories.length}`);
      } catch (error) {
        console.error(
          `Invalid geography: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });
}
