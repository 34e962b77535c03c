/**
 * Configuration loading and validation
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import YAML from "yaml";
import { ScoutConfig, ScoutConfigSchema, getDefaultConfig } from "./types.js";
import { ConfigError, isNotFoundError } from "../runtime/errors.js";

/** Default config directory */
export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".scout");

/** Default config file name */
export const CONFIG_FILE_NAME = "config.yaml";

/** Environment variable for config path override */
export const SCOUT_CONFIG_PATH_ENV = "SCOUT_CONFIG_PATH";

/** Environment variable for config directory override */
export const SCOUT_CONFIG_DIR_ENV = "SCOUT_CONFIG_DIR";

/**
 * Get the configuration directory path
 */
export function getConfigDir(): string {
  return process.env[SCOUT_CONFIG_DIR_ENV] || DEFAULT_CONFIG_DIR;
}

/**
 * Get the configuration file path
 */
export function getConfigPath(): string {
  const override = process.env[SCOUT_CONFIG_PATH_ENV];
  if (override) {
    return override;
  }
  return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

/**
 * Directory that receives run reports
 */
export function getOutputDir(config: ScoutConfig): string {
  return config.outputDir || path.join(getConfigDir(), "runs");
}

/**
 * Check if config file exists
 */
export async function configExists(): Promise<boolean> {
  try {
    await fs.access(getConfigPath());
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse and validate raw config text
 */
export function parseConfig(content: string, source = "<inline>"): ScoutConfig {
  const parsed: unknown = YAML.parse(content) ?? {};
  const result = ScoutConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${source}: ${issues}`);
  }
  return result.data;
}

/**
 * Load configuration from file
 */
export async function loadConfig(): Promise<ScoutConfig> {
  const configPath = getConfigPath();

  let content: string;
  try {
    content = await fs.readFile(configPath, "utf-8");
  } catch (error) {
    if (isNotFoundError(error)) {
      // Return default config if file doesn't exist
      return getDefaultConfig();
    }
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return parseConfig(content, configPath);
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: ScoutConfig): Promise<void> {
  const configPath = getConfigPath();
  const configDir = path.dirname(configPath);

  await fs.mkdir(configDir, { recursive: true });

  // Validate before saving
  const validated = ScoutConfigSchema.parse(config);

  const content = YAML.stringify(validated, { indent: 2 });
  await fs.writeFile(configPath, content, "utf-8");
}

/**
 * Initialize configuration with defaults
 */
export async function initConfig(
  geographyPath?: string,
  options?: { force?: boolean },
): Promise<{ configPath: string; config: ScoutConfig }> {
  const configPath = getConfigPath();

  if (!options?.force && (await configExists())) {
    throw new ConfigError(`Config already exists at ${configPath}`);
  }

  const config = getDefaultConfig();

  if (geographyPath) {
    config.geographyPath = path.resolve(geographyPath);
  }

  await saveConfig(config);

  return { configPath, config };
}
