/**
 * Configuration type definitions
 */

import type { LogLevel } from "../utils/logger";
import type { ChecksumAlgorithm, Tier } from "./record";

export interface DatabaseConfig {
  path: string;
}

/** Root directory of each backup tier. Unset tiers are never searched. */
export type TiersConfig = Partial<Record<Tier, string>>;

export interface ChecksumConfig {
  /** Algorithm used when a checksum is computed for storage (default: sha3_256) */
  algorithm: ChecksumAlgorithm;
  /** Files smaller than this get a checksum as soon as their record is built */
  autoThresholdBytes: number;
  /** Files smaller than this are always re-hashed when a folder is indexed */
  regenerateThresholdBytes: number;
}

export interface ClearConfig {
  includeSubfolders: boolean;
  /** Days a session must be old before its files may be cleared */
  minAgeDays: number;
  /** Path substrings a file must contain (any of). Empty matches everything. */
  include: string[];
  /** Path substrings that exclude a file */
  exclude: string[];
  /** Clear raw capture folders even when no derived data exists on the archive tier */
  skipRawDataCheck: boolean;
  /** Roots under which raw capture data lives */
  rawDataRoots: string[];
  /** Suffix of derived-data folders next to a session on the archive tier */
  derivedDataSuffix: string;
  /** Only expand a repository directory into subfolders that carry a session */
  onlySessionFolders: boolean;
  /** Subfolder names (substrings) skipped when expanding a repository directory */
  skipFilters: string[];
  dryRun: boolean;
}

export interface CopyConfig {
  maxAttempts: number;
}

export interface LoggingConfig {
  level: LogLevel;
  /** Optional log file; relative paths resolve against the config file */
  file?: string;
}

export interface TierkeepConfig {
  version: string;
  database: DatabaseConfig;
  tiers: TiersConfig;
  checksum: ChecksumConfig;
  clear: ClearConfig;
  copy: CopyConfig;
  /** Upper bound on files processed at once */
  concurrency: number;
  logging: LoggingConfig;
}
