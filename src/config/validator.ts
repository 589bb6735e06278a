/**
 * Configuration validation
 *
 * Each section is checked and rebuilt as its typed form; unknown keys are
 * ignored.
 */

import {
  CHECKSUM_ALGORITHMS,
  type ChecksumConfig,
  type ClearConfig,
  type CopyConfig,
  type LoggingConfig,
  type TierkeepConfig,
  TIERS,
  type TiersConfig,
} from "../types";
import { isChecksumAlgorithm } from "../core/checksum/formats";
import { TierkeepError } from "../utils/errors";
import { isLogLevel } from "../utils/logger";
import { isRecord } from "./defaults";

export class ConfigError extends TierkeepError {
  constructor(message: string) {
    super("CONFIG", message);
    this.name = "ConfigError";
  }
}

function section(c: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = c[name];
  if (!isRecord(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requireString(value: unknown, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${field} must be a string`);
  }
  return value;
}

function requireBoolean(value: unknown, field: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`${field} must be a boolean`);
  }
  return value;
}

function requireInteger(value: unknown, field: string, min: number): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`${field} must be an integer >= ${min}`);
  }
  return value;
}

/**
 * A list of path substrings. Besides an array, a single string with entries
 * separated by `|` is accepted: `_temp_ | .npx2`.
 */
function requireFilterList(value: unknown, field: string): string[] {
  if (typeof value === "string") {
    return value
      .split("|")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`${field} must be an array of strings`);
  }
  return value.map((item, i) => {
    if (typeof item !== "string") {
      throw new ConfigError(`${field}[${i}] must be a string`);
    }
    return item;
  });
}

function validateTiers(c: Record<string, unknown>): TiersConfig {
  const raw = c.tiers ?? {};
  if (!isRecord(raw)) {
    throw new ConfigError("tiers must be an object mapping tier names to root folders");
  }
  const tiers: TiersConfig = {};
  for (const [name, root] of Object.entries(raw)) {
    const tier = TIERS.find((t) => t === name);
    if (!tier) {
      throw new ConfigError(`tiers.${name} is not a tier (expected one of: ${TIERS.join(", ")})`);
    }
    if (root === null || root === undefined || root === "") continue;
    tiers[tier] = requireString(root, `tiers.${name}`);
  }
  return tiers;
}

function validateChecksum(c: Record<string, unknown>): ChecksumConfig {
  const checksum = section(c, "checksum");
  const algorithm = checksum.algorithm;
  if (!isChecksumAlgorithm(algorithm)) {
    throw new ConfigError(`checksum.algorithm must be one of: ${CHECKSUM_ALGORITHMS.join(", ")}`);
  }
  return {
    algorithm,
    autoThresholdBytes: requireInteger(checksum.autoThresholdBytes, "checksum.autoThresholdBytes", 0),
    regenerateThresholdBytes: requireInteger(
      checksum.regenerateThresholdBytes,
      "checksum.regenerateThresholdBytes",
      0,
    ),
  };
}

function validateClear(c: Record<string, unknown>): ClearConfig {
  const clear = section(c, "clear");
  return {
    includeSubfolders: requireBoolean(clear.includeSubfolders, "clear.includeSubfolders"),
    minAgeDays: requireInteger(clear.minAgeDays, "clear.minAgeDays", 0),
    include: requireFilterList(clear.include, "clear.include"),
    exclude: requireFilterList(clear.exclude, "clear.exclude"),
    skipRawDataCheck: requireBoolean(clear.skipRawDataCheck, "clear.skipRawDataCheck"),
    rawDataRoots: requireFilterList(clear.rawDataRoots, "clear.rawDataRoots"),
    derivedDataSuffix: requireString(clear.derivedDataSuffix, "clear.derivedDataSuffix"),
    onlySessionFolders: requireBoolean(clear.onlySessionFolders, "clear.onlySessionFolders"),
    skipFilters: requireFilterList(clear.skipFilters, "clear.skipFilters"),
    dryRun: requireBoolean(clear.dryRun, "clear.dryRun"),
  };
}

function validateCopy(c: Record<string, unknown>): CopyConfig {
  const copy = section(c, "copy");
  return { maxAttempts: requireInteger(copy.maxAttempts, "copy.maxAttempts", 1) };
}

function validateLogging(c: Record<string, unknown>): LoggingConfig {
  const logging = section(c, "logging");
  if (!isLogLevel(logging.level)) {
    throw new ConfigError("logging.level must be one of: debug, info, warn, error");
  }
  const file = logging.file;
  if (file === undefined || file === null || file === "") {
    return { level: logging.level };
  }
  return { level: logging.level, file: requireString(file, "logging.file") };
}

/**
 * Validate a configuration object and return its typed form.
 */
export function validateConfig(config: unknown): TierkeepConfig {
  if (!isRecord(config)) {
    throw new ConfigError("Config must be an object");
  }

  const version = config.version;
  if (typeof version !== "string" && typeof version !== "number") {
    throw new ConfigError("Config must have a 'version' field");
  }

  return {
    version: String(version),
    database: { path: requireString(section(config, "database").path, "database.path") },
    tiers: validateTiers(config),
    checksum: validateChecksum(config),
    clear: validateClear(config),
    copy: validateCopy(config),
    concurrency: requireInteger(config.concurrency, "concurrency", 1),
    logging: validateLogging(config),
  };
}
