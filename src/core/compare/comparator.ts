/**
 * File record comparison
 *
 * `classify(a, b)` describes what `b` is relative to `a`. The checks run in a
 * fixed order and the first that applies wins. Swapping the operands only
 * changes the result for the one-sided "missing checksum" kinds (see
 * `mirrorMatchKind`).
 */

import type { FileRecord } from "../record/file-record";
import type { MatchKind } from "./match-kind";

/**
 * True/false when both records carry device identity, null when either is unknown.
 */
function sameFile(a: FileRecord, b: FileRecord): boolean | null {
  if (!a.fileId || !b.fileId) return null;
  return a.fileId.dev === b.fileId.dev && a.fileId.ino === b.fileId.ino;
}

export function classify(a: FileRecord, b: FileRecord): MatchKind {
  const identity = sameFile(a, b);

  const sameLocation = a.locationKey !== null && a.locationKey === b.locationKey;
  const samePlace = (sameLocation || identity === true) && identity !== false;
  const differentPlace = !sameLocation && identity !== true;

  const sameSize = a.size === b.size;
  const sameName = a.name !== null && b.name !== null && a.name.toLowerCase() === b.name.toLowerCase();
  const sameTag = a.subgroupTag === b.subgroupTag;

  const aMissing = a.checksum === null;
  const bMissing = b.checksum === null;
  const sameAlgorithm =
    a.checksum !== null && b.checksum !== null && a.checksum.algorithm === b.checksum.algorithm;
  const algorithmMismatch =
    a.checksum !== null && b.checksum !== null && a.checksum.algorithm !== b.checksum.algorithm;
  const sameChecksum = sameAlgorithm && a.checksum?.value === b.checksum?.value;
  const checksumIndeterminate = aMissing || bMissing || algorithmMismatch;

  // 1. same physical file
  if (identity !== false) {
    if (a.identityKey === b.identityKey) return "SELF";
    if (samePlace && sameSize && (sameChecksum || (aMissing && bMissing))) return "SELF";
  }

  // 2-4. same place, information differs
  if (samePlace && sameSize) {
    if (bMissing && !aMissing) return "SELF_MISSING_OTHER";
    if (aMissing && !bMissing) return "SELF_MISSING_SELF";
    if (algorithmMismatch) return "SELF_CHECKSUM_TYPE_MISMATCH";
  }
  if (samePlace || sameLocation) {
    return "SELF_PREVIOUS_VERSION";
  }

  if (differentPlace && sameSize && sameTag) {
    // 5. probable copy, checksums can't confirm it
    if (sameName) {
      if (aMissing && bMissing) return "COPY_MISSING_BOTH";
      if (bMissing) return "COPY_MISSING_OTHER";
      if (aMissing) return "COPY_MISSING_SELF";
      if (algorithmMismatch) return "COPY_CHECKSUM_TYPE_MISMATCH";
    }

    // 6. possible renamed copy
    if (!sameName && checksumIndeterminate) return "POSSIBLE_COPY_RENAMED";

    // 7. confirmed copy
    if (sameChecksum) return sameName ? "VALID_COPY" : "VALID_COPY_RENAMED";
  }

  // 8. same file name, contents disagree
  if (differentPlace && sameName && sameTag && sameAlgorithm) {
    if (!sameSize && !sameChecksum) return "COPY_UNSYNCED_DATA";
    if (!sameSize && sameChecksum) return "COPY_UNSYNCED_CHECKSUM";
    if (sameSize && !sameChecksum) return "COPY_UNSYNCED_OR_CORRUPT_DATA";
  }

  // 9.
  if (sameChecksum && !sameSize && !sameName) return "CHECKSUM_COLLISION";

  // 10.
  if (sameAlgorithm && !sameChecksum && !sameSize && !sameName) return "UNRELATED";

  // 11.
  return algorithmMismatch ? "UNKNOWN_CHECKSUM_TYPE_MISMATCH" : "UNKNOWN";
}
