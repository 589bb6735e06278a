/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { TierkeepConfig } from "../types";
import { errorMessage, isNotFound } from "../utils/errors";
import { logger } from "../utils/logger";
import { DEFAULT_VERSION, deepMerge, defaultsRecord, isRecord } from "./defaults";
import { buildInlineConfig, type InlineConfigOptions } from "./inline";
import { configDir, resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

export const CONFIG_FILE_NAMES = ["tierkeep.config.yaml", "tierkeep.config.yml", "tierkeep.config.json"];

function parseConfigContent(content: string, ext: string): Record<string, unknown> {
  let parsed: unknown;
  if (ext === ".yaml" || ext === ".yml") {
    try {
      parsed = yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  } else if (ext === ".json") {
    try {
      parsed = JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  } else {
    throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError("Config must be an object");
  }
  return parsed;
}

/**
 * Load, validate and resolve a config file. Inline options override the
 * file's values.
 */
export async function loadConfig(configPath: string, inline: InlineConfigOptions = {}): Promise<TierkeepConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (e) {
    if (isNotFound(e)) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw new ConfigError(`Could not read config file ${absolutePath}: ${errorMessage(e)}`);
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  const merged = deepMerge(deepMerge(defaultsRecord(), parsed), buildInlineConfig(inline));
  logger.debug(`Loaded config from ${absolutePath}`);

  return resolvePaths(validateConfig(merged), configDir(absolutePath));
}

/**
 * Config from defaults and inline options alone, with relative paths
 * resolved against the working directory.
 */
export function configFromInlineOptions(inline: InlineConfigOptions, cwd: string = process.cwd()): TierkeepConfig {
  const merged = deepMerge({ ...defaultsRecord(), version: DEFAULT_VERSION }, buildInlineConfig(inline));
  return resolvePaths(validateConfig(merged), cwd);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Load the given config file, or the one in the working directory. Without
 * either, the defaults and inline options are used.
 */
export async function findAndLoadConfig(
  configPath?: string,
  inline: InlineConfigOptions = {},
): Promise<TierkeepConfig> {
  if (configPath) {
    return loadConfig(configPath, inline);
  }

  const found = findConfigFile();
  if (found) {
    return loadConfig(found, inline);
  }

  logger.debug("No config file found, using defaults and command line options");
  return configFromInlineOptions(inline);
}
