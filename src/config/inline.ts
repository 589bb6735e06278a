/**
 * Inline configuration from CLI flags
 */

import type { TierkeepConfig } from "../types";
import { deepMerge } from "./defaults";
import { ConfigError, validateConfig } from "./validator";

/**
 * Options that can be passed as CLI flags and override the config file
 */
export interface InlineConfigOptions {
  /** Database file path */
  database?: string;

  // Tier roots
  archive?: string;
  staging?: string;
  local?: string;
  other?: string;

  /** Checksum algorithm for new checksums */
  algorithm?: string;

  // Clear
  minAgeDays?: string;
  include?: string[];
  exclude?: string[];
  dryRun?: boolean;
  skipRawDataCheck?: boolean;
  noSubfolders?: boolean;

  concurrency?: string;
  logLevel?: string;
  logFile?: string;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  database: { type: "string" },
  archive: { type: "string" },
  staging: { type: "string" },
  local: { type: "string" },
  other: { type: "string" },
  algorithm: { type: "string" },
  "min-age-days": { type: "string" },
  include: { type: "string", multiple: true },
  exclude: { type: "string", multiple: true },
  "dry-run": { type: "boolean" },
  "skip-raw-data-check": { type: "boolean" },
  "no-subfolders": { type: "boolean" },
  concurrency: { type: "string" },
  "log-level": { type: "string" },
  "log-file": { type: "string" },
} as const;

/** Values parseArgs produces for INLINE_CONFIG_OPTIONS */
export interface ParsedInlineValues {
  database?: string;
  archive?: string;
  staging?: string;
  local?: string;
  other?: string;
  algorithm?: string;
  "min-age-days"?: string;
  include?: string[];
  exclude?: string[];
  "dry-run"?: boolean;
  "skip-raw-data-check"?: boolean;
  "no-subfolders"?: boolean;
  concurrency?: string;
  "log-level"?: string;
  "log-file"?: string;
}

/**
 * Pick the inline options out of parsed CLI values
 */
export function extractInlineOptions(values: ParsedInlineValues): InlineConfigOptions {
  return {
    database: values.database,
    archive: values.archive,
    staging: values.staging,
    local: values.local,
    other: values.other,
    algorithm: values.algorithm,
    minAgeDays: values["min-age-days"],
    include: values.include,
    exclude: values.exclude,
    dryRun: values["dry-run"],
    skipRawDataCheck: values["skip-raw-data-check"],
    noSubfolders: values["no-subfolders"],
    concurrency: values.concurrency,
    logLevel: values["log-level"],
    logFile: values["log-file"],
  };
}

function toInteger(value: string, flag: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`--${flag} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Build a partial config from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (options.database) {
    config.database = { path: options.database };
  }

  const tiers: Record<string, string> = {};
  if (options.archive) tiers.archive = options.archive;
  if (options.staging) tiers.staging = options.staging;
  if (options.local) tiers.local = options.local;
  if (options.other) tiers.other = options.other;
  if (Object.keys(tiers).length > 0) config.tiers = tiers;

  if (options.algorithm) {
    config.checksum = { algorithm: options.algorithm };
  }

  const clear: Record<string, unknown> = {};
  if (options.minAgeDays !== undefined) clear.minAgeDays = toInteger(options.minAgeDays, "min-age-days");
  if (options.include && options.include.length > 0) clear.include = options.include;
  if (options.exclude && options.exclude.length > 0) clear.exclude = options.exclude;
  if (options.dryRun) clear.dryRun = true;
  if (options.skipRawDataCheck) clear.skipRawDataCheck = true;
  if (options.noSubfolders) clear.includeSubfolders = false;
  if (Object.keys(clear).length > 0) config.clear = clear;

  if (options.concurrency !== undefined) {
    config.concurrency = toInteger(options.concurrency, "concurrency");
  }

  const logging: Record<string, unknown> = {};
  if (options.logLevel) logging.level = options.logLevel;
  if (options.logFile) logging.file = options.logFile;
  if (Object.keys(logging).length > 0) config.logging = logging;

  return config;
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(baseConfig: TierkeepConfig, inlineOptions: InlineConfigOptions): TierkeepConfig {
  const merged = deepMerge({ ...baseConfig }, buildInlineConfig(inlineOptions));
  return validateConfig(merged);
}
