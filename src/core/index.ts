/**
 * Core module exports
 */

// Checksums
export { canonicalChecksum, cheapestAlgorithm, isChecksumAlgorithm, isValidChecksum } from "./checksum/formats";
export { ChecksumPolicy, type ChecksumPolicyOptions, DEFAULT_AUTO_THRESHOLD_BYTES } from "./checksum/policy";
export { type ChecksumProvider, createChecksumProvider, createDefaultProviders } from "./checksum/providers";
export {
  type ChecksumContext,
  exchangeIfChecksumInStore,
  generateChecksum,
  generateChecksumIfNotInStore,
} from "./checksum/strategies";

// Clear
export {
  collectFiles,
  type ClearOptions,
  ClearOrchestrator,
  type ClearResult,
  type ClearTarget,
  expandClearTargets,
  FolderIndexer,
  type IndexResult,
} from "./clear";

// Comparison
export { classify } from "./compare/comparator";
export {
  IGNORED_SET,
  INVALID_SET,
  MATCH_KINDS,
  type MatchKind,
  type MatchKindSet,
  mirrorMatchKind,
  SELF_SET,
  UNCONFIRMED_SET,
  VALID_SET,
} from "./compare/match-kind";

// Copy
export { type CopyOptions, CopyOrchestrator, type CopyOutcome, type CopyStatus } from "./copy/orchestrator";

// Records
export { FileRecord, type FileRecordInit, loadFileRecord } from "./record/file-record";
export { parseSession, sessionRelativePath } from "./record/session";

// Status
export {
  type BackupCandidate,
  type BackupStatus,
  BackupStatusEvaluator,
  type Evaluation,
  isDeletionEligible,
  isUnconfirmedStatus,
  isValidStatus,
} from "./status/evaluator";
export { type BackupLocator, TierRootLocator } from "./status/locator";

// Store
export { type ClassifiedMatch, findMatches, type RecordStore } from "./store/record-store";
