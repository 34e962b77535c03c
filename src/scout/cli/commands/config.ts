/**
 * scout config command - View and edit configuration
 */

import { Command } from "commander";
import { loadConfig, saveConfig, getConfigPath } from "../../config/loader.js";
import { ScoutConfigSchema } from "../../config/types.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Value at a dot-separated path; undefined when any segment is missing
 */
export function getPath(root: unknown, key: string): unknown {
  let value: unknown = root;
  for (const part of key.split(".")) {
    if (!isRecord(value) || !(part in value)) return undefined;
    value = value[part];
  }
  return value;
}

/**
 * Set a dot-separated path, creating intermediate objects
 */
export function setPath(root: Record<string, unknown>, key: string, value: unknown): void {
  const parts = key.split(".");
  const last = parts.pop();
  if (!last) throw new Error("Invalid key");

  let parent = root;
  for (const part of parts) {
    const next = parent[part];
    if (isRecord(next)) {
      parent = next;
    } else {
      const created: Record<string, unknown> = {};
      parent[part] = created;
      parent = created;
    }
  }
  parent[last] = value;
}

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command("config").description("View and edit configuration");

  // Show config path
  configCmd
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  // Show full config
  configCmd
    .command("show")
    .description("Show current configuration as JSON")
    .action(async () => {
      try {
        const config = await loadConfig();
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        console.error(
          `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });

  // Get a config value
  configCmd
    .command("get")
    .description("Get a config value")
    .argument("<key>", "Config key (dot notation, e.g., resolution.waveCap)")
    .action(async (key: string) => {
      try {
        const value = getPath(await loadConfig(), key);
        if (value === undefined) {
          console.error(`Key not found: ${key}`);
          process.exit(1);
        }

        console.log(typeof value === "object" ? JSON.stringify(value, null, 2) : String(value));
      } catch (error) {
        console.error(
          `Failed to get config: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });

  // Set a config value
  configCmd
    .command("set")
    .description("Set a config value")
    .argument("<key>", "Config key (dot notation)")
    .argument("<value>", "Value to set (JSON for numbers, booleans, objects and arrays)")
    .action(async (key: string, valueStr: string) => {
      try {
        const draft: Record<string, unknown> = structuredClone(await loadConfig());

        let value: unknown;
        try {
          value = JSON.parse(valueStr);
        } catch {
          // Not JSON, treat as string
          value = valueStr;
        }

        setPath(draft, key, value);

        const result = ScoutConfigSchema.safeParse(draft);
        if (!result.success) {
          const issues = result.error.issues
            .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
            .join("; ");
          console.error(`Invalid value for ${key}: ${issues}`);
          process.exit(1);
        }

        await saveConfig(result.data);
        console.log(`✓ Set ${key} = ${JSON.stringify(value)}`);
      } catch (error) {
        console.error(
          `Failed to set config: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });
}
