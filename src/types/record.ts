/**
 * File record type definitions
 */

export const CHECKSUM_ALGORITHMS = ["crc32", "sha3_256", "sha256"] as const;

/** Ordered cheapest first. */
export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];

export interface Checksum {
  algorithm: ChecksumAlgorithm;
  value: string;
}

/**
 * The recording session a file belongs to, parsed from a folder name of the
 * form `<id>_<subject>_<YYYYMMDD>`.
 */
export interface SessionContext {
  /** The full folder string, e.g. `1234567890_123456_20240115` */
  id: string;
  subjectId: string;
  /** Session date as YYYYMMDD */
  date: string;
}

/** Device and inode of a file as seen when its record was read. */
export interface FileIdentity {
  dev: number;
  ino: number;
}

export const TIERS = ["archive", "staging", "local", "other"] as const;

/** Backup tiers in priority order. */
export type Tier = (typeof TIERS)[number];

export interface TierPath {
  tier: Tier;
  location: string;
}
