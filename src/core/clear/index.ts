/**
 * Clear module exports
 */

export { collectFiles, collectSubdirectories, matchesFilters, normalizeFilters } from "./file-collector";
export { isOldEnough, isOriginalRawData, logicalDate, probeLettersInName, rawDataWithoutDerived } from "./guards";
export { FolderIndexer, type IndexResult } from "./indexer";
export {
  type ClearDeletion,
  type ClearFailure,
  type ClearOptions,
  ClearOrchestrator,
  type ClearResult,
  DEFAULT_CLEAR_OPTIONS,
} from "./orchestrator";
export { type ClearTarget, expandClearTargets } from "./targets";
