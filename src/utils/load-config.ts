/**
 * Configuration Loader
 * Loads and merges configuration from defaults and user config
 */

import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import type { AppConfig, ConfigError, PartialAppConfig } from "../types";
import { AppConfigSchema, PartialAppConfigSchema } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("anime-images", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/anime-images or ~/.config/anime-images
 * - macOS: ~/Library/Preferences/anime-images
 * - Windows: %APPDATA%\anime-images
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Load default configuration with Zod validation
 */
export async function loadDefaultConfig(): Promise<AppConfig> {
  const defaultConfigPath = join(__dirname, "..", "config", "default.json");
  const content = await readFile(defaultConfigPath, "utf-8");
  return AppConfigSchema.parse(JSON.parse(content));
}

/**
 * Load a partial configuration file with Zod validation
 * Throws error if config is invalid
 */
async function loadPartialConfig(configPath: string): Promise<PartialAppConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialAppConfigSchema.parse(JSON.parse(content));
}

/**
 * Deep merge two configs, one level down
 */
export function mergeConfig(
  base: AppConfig,
  override: PartialAppConfig,
): AppConfig {
  return {
    images: {
      ...base.images,
      ...override.images,
      headers: { ...base.images.headers, ...override.images?.headers },
    },
    api: { ...base.api, ...override.api },
    display: { ...base.display, ...override.display },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: AppConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A config file that fails to load or validate is skipped and reported
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let config = await loadDefaultConfig();
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
