/**
 * Classification outcomes for a pair of file records
 */

export const MATCH_KINDS = [
  "SELF",
  "SELF_MISSING_SELF",
  "SELF_MISSING_OTHER",
  "SELF_CHECKSUM_TYPE_MISMATCH",
  "SELF_PREVIOUS_VERSION",
  "POSSIBLE_COPY_RENAMED",
  "COPY_MISSING_BOTH",
  "COPY_MISSING_SELF",
  "COPY_MISSING_OTHER",
  "COPY_CHECKSUM_TYPE_MISMATCH",
  "COPY_UNSYNCED_CHECKSUM",
  "COPY_UNSYNCED_DATA",
  "COPY_UNSYNCED_OR_CORRUPT_DATA",
  "VALID_COPY",
  "VALID_COPY_RENAMED",
  "CHECKSUM_COLLISION",
  "UNRELATED",
  "UNKNOWN",
  "UNKNOWN_CHECKSUM_TYPE_MISMATCH",
] as const;

export type MatchKind = (typeof MATCH_KINDS)[number];

export type MatchKindSet = ReadonlySet<MatchKind>;

/** The same file, possibly with incomplete checksum information. */
export const SELF_SET: MatchKindSet = new Set<MatchKind>([
  "SELF",
  "SELF_MISSING_SELF",
  "SELF_MISSING_OTHER",
  "SELF_CHECKSUM_TYPE_MISMATCH",
]);

/** A copy proven identical by checksum. */
export const VALID_SET: MatchKindSet = new Set<MatchKind>(["VALID_COPY", "VALID_COPY_RENAMED"]);

/** Probably a copy; needs a checksum to confirm. */
export const UNCONFIRMED_SET: MatchKindSet = new Set<MatchKind>([
  "COPY_MISSING_BOTH",
  "COPY_MISSING_SELF",
  "COPY_MISSING_OTHER",
  "COPY_CHECKSUM_TYPE_MISMATCH",
  "POSSIBLE_COPY_RENAMED",
]);

/** A copy whose contents disagree with the original. */
export const INVALID_SET: MatchKindSet = new Set<MatchKind>([
  "COPY_UNSYNCED_CHECKSUM",
  "COPY_UNSYNCED_OR_CORRUPT_DATA",
  "COPY_UNSYNCED_DATA",
]);

export const IGNORED_SET: MatchKindSet = new Set<MatchKind>([
  "UNRELATED",
  "UNKNOWN",
  "UNKNOWN_CHECKSUM_TYPE_MISMATCH",
  "CHECKSUM_COLLISION",
  "SELF_PREVIOUS_VERSION",
]);

export function union(...sets: MatchKindSet[]): MatchKindSet {
  const merged = new Set<MatchKind>();
  for (const set of sets) {
    for (const kind of set) merged.add(kind);
  }
  return merged;
}

/**
 * The kind `classify(b, a)` returns when `classify(a, b)` returned `kind`.
 */
export function mirrorMatchKind(kind: MatchKind): MatchKind {
  switch (kind) {
    case "SELF_MISSING_SELF":
      return "SELF_MISSING_OTHER";
    case "SELF_MISSING_OTHER":
      return "SELF_MISSING_SELF";
    case "COPY_MISSING_SELF":
      return "COPY_MISSING_OTHER";
    case "COPY_MISSING_OTHER":
      return "COPY_MISSING_SELF";
    default:
      return kind;
  }
}
