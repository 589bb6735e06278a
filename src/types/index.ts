/**
 * Centralized type exports
 */

// Config types
export type {
  ChecksumConfig,
  ClearConfig,
  CopyConfig,
  DatabaseConfig,
  LoggingConfig,
  TierkeepConfig,
  TiersConfig,
} from "./config";
// Database types
export type { AddResult, Migration, RawFileRecordRow } from "./database";
// Record types
export type {
  Checksum,
  ChecksumAlgorithm,
  FileIdentity,
  SessionContext,
  Tier,
  TierPath,
} from "./record";
export { CHECKSUM_ALGORITHMS, TIERS } from "./record";
