/**
 * Default configuration values
 */

import type { TierkeepConfig } from "../types";

/** Used when no config file exists and the CLI runs from flags alone. */
export const DEFAULT_VERSION = "1";

export const DEFAULT_CONFIG: Omit<TierkeepConfig, "version"> = {
  database: {
    path: "./data/tierkeep.db",
  },
  tiers: {},
  checksum: {
    algorithm: "sha3_256",
    autoThresholdBytes: 50 * 1024 * 1024,
    regenerateThresholdBytes: 1024 * 1024,
  },
  clear: {
    includeSubfolders: true,
    minAgeDays: 0,
    include: [],
    exclude: [],
    skipRawDataCheck: false,
    rawDataRoots: [],
    derivedDataSuffix: "_sorted",
    onlySessionFolders: false,
    skipFilters: [],
    dryRun: false,
  },
  copy: {
    maxAttempts: 3,
  },
  concurrency: 8,
  logging: {
    level: "info",
  },
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source overriding target. Arrays are
 * replaced, not concatenated.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/** The defaults as a plain object, ready to merge a parsed file over. */
export function defaultsRecord(): Record<string, unknown> {
  return { ...structuredClone(DEFAULT_CONFIG) };
}
