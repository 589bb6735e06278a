/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { TierkeepConfig, TiersConfig } from "../types";
import { TIERS } from "../types";
import { normalizeLocation } from "../utils/path";

/** Absolute on this host, or a drive letter / network share path from another one. */
export function isAbsoluteLocation(location: string): boolean {
  return path.isAbsolute(location) || /^[A-Za-z]:[\\/]/.test(location) || location.startsWith("\\\\");
}

function resolveAgainst(baseDir: string, location: string): string {
  return normalizeLocation(isAbsoluteLocation(location) ? location : path.resolve(baseDir, location));
}

/**
 * Resolve relative paths in config against the config file's directory
 * (or `baseDir` when the config did not come from a file).
 */
export function resolvePaths(config: TierkeepConfig, baseDir: string): TierkeepConfig {
  const tiers: TiersConfig = {};
  for (const tier of TIERS) {
    const root = config.tiers[tier];
    if (root) tiers[tier] = resolveAgainst(baseDir, root);
  }

  const databasePath =
    config.database.path === ":memory:" ? ":memory:" : resolveAgainst(baseDir, config.database.path);

  return {
    ...config,
    database: { path: databasePath },
    tiers,
    clear: {
      ...config.clear,
      rawDataRoots: config.clear.rawDataRoots.map((root) => resolveAgainst(baseDir, root)),
    },
    logging: config.logging.file
      ? { ...config.logging, file: resolveAgainst(baseDir, config.logging.file) }
      : config.logging,
  };
}

export function configDir(configPath: string): string {
  return path.dirname(path.resolve(configPath));
}
